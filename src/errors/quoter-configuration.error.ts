/**
 * Option of a quoting capability that failed validation.
 */
export type QuoterConfigurationOption = "quoteMode" | "quotePolicy" | "quotes";

/**
 * Error thrown when a quoter or engine is built from an invalid configuration.
 *
 * This can occur when:
 * - The quote mode or policy is not one of the known values (untyped callers, config files)
 * - The dialect's quote pair is not made of exactly two characters
 */
export class QuoterConfigurationError extends Error {
  /**
   * The option that failed validation.
   */
  public readonly option: QuoterConfigurationOption;

  /**
   * The rejected value.
   */
  public readonly value: unknown;

  /**
   * Creates a new QuoterConfigurationError.
   *
   * @param message - Descriptive error message
   * @param option - Option that failed validation
   * @param value - The rejected value
   */
  public constructor(message: string, option: QuoterConfigurationOption, value: unknown) {
    super(message);
    this.name = "QuoterConfigurationError";
    this.option = option;
    this.value = value;

    // Maintains proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, QuoterConfigurationError);
    }
  }
}
