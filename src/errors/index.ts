/**
 * Error utilities — barrel export.
 */

export { sanitizeForUser, extractErrorMessage } from "../errors.js";
export {
    AgentError,
    ConfigurationError,
    ExternalCallError,
    LookupError,
    ValidationError,
    withRetry,
} from "./AgentError.js";
export type { AgentErrorOptions, RetryOptions } from "./AgentError.js";
