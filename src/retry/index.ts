export { classifyFault, classifyStatus, isInvalidState, isRetryableStatus, StatusReason } from "./classifier.js";
export type { FaultClassification, StatusClassification } from "./classifier.js";
