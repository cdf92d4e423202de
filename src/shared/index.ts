export { devLog, devWarn, devError, isLogEnabled } from "./debug-log.js";
export {
  ConfigError,
  IndexCorruptionError,
  IngestionError,
  ServiceError,
  errorMessage,
} from "./errors.js";
export type { RagErrorCode, ServiceKind } from "./errors.js";
