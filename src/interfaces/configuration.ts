/**
 * @module interfaces/configuration
 * @description Caller-fixable configuration errors.
 *
 * Raised for malformed option values and option combinations that can
 * never work. They surface immediately and are never retried.
 */

export type ConfigurationErrorCode =
  | "MALFORMED_ADDRESS"
  | "MALFORMED_VALUE"
  | "INVALID_KEY"
  | "UNKNOWN_MEDIUM"
  | "UNKNOWN_OPTION"
  | "MISSING_ARGUMENT"
  | "LONG_OPTION_PREFIX"
  | "UNSUPPORTED_DOMAIN_MEDIUM"
  | "INTERFACE_NOT_BOUND";

export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly code: ConfigurationErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}
