import type { Mode, Outcome } from "../types/run.js";
import { toError } from "../types/errors.js";

/** Every event and its payload. */
export interface RunEventMap {
  "run:start": { runId: string; mode: Mode; units: number; workers: number };
  "unit:start": { unit: string; worker: number };
  "unit:end": Outcome;
  "worker:fault": { worker: number; code: number | null; signal: string | null; remaining: number };
  "run:cancel": { runId: string; reason: string };
  "run:end": { runId: string; duration_ms: number };
}

export type RunEventListener<K extends keyof RunEventMap> = (payload: RunEventMap[K]) => void;

type ListenerSets<E extends keyof RunEventMap = keyof RunEventMap> = {
  [K in E]?: Set<RunEventListener<K>>;
};

/**
 * Type-safe event bus for progress reporting. Listener errors are collected
 * instead of breaking the run.
 */
export class RunEvents {
  private readonly listeners: ListenerSets = {};
  readonly listenerErrors: Error[] = [];

  on<K extends keyof RunEventMap>(event: K, listener: RunEventListener<K>): () => void {
    const listeners: ListenerSets<K> = this.listeners;
    const existing: ListenerSets<K>[K] = listeners[event];
    const set: Set<RunEventListener<K>> = existing ?? new Set<RunEventListener<K>>();
    set.add(listener);
    listeners[event] = set;
    return () => {
      set.delete(listener);
    };
  }

  emit<K extends keyof RunEventMap>(event: K, payload: RunEventMap[K]): void {
    const set: ListenerSets[K] = this.listeners[event];
    if (!set) return;
    for (const listener of set) {
      try {
        listener(payload);
      } catch (e) {
        this.listenerErrors.push(toError(e));
      }
    }
  }
}
