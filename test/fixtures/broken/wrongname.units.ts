import { defineTopic } from "../../../src/registry/define.js";

export default defineTopic("renamed", [{ name: "test_wrong_topic", run: () => undefined }]);
