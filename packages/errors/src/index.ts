export { AppError } from "./app-error.js";
export type { AppErrorOptions } from "./app-error.js";

export {
  NotFoundError,
  ValidationError,
  SourceUnavailableError,
  ExternalServiceError,
} from "./errors.js";
