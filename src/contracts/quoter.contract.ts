import type { QuoteModeName, QuotePolicyName } from "../types";

/**
 * Pair of quote characters wrapping an identifier, e.g. `['"', '"']` or `["[", "]"]`.
 */
export type QuotePair = readonly [prefix: string, suffix: string];

/**
 * Quoting capability consumed by the quoting helpers.
 *
 * Implemented independently by the standalone `Quoter` and by `Engine`,
 * which forwards to the dialect it owns. The quote pair and the mode/policy
 * never change during the lifetime of an implementer.
 *
 * @example
 * ```typescript
 * const quoter = new Quoter(new PostgresDialect(), {
 *   quotePolicy: QuotePolicy.AddReserved,
 * });
 *
 * quote(quoter, "order", true); // '"order"'
 * quote(quoter, "total", true); // 'total'
 * ```
 */
export interface QuoterContract {
  /**
   * The dialect's opening and closing quote characters.
   */
  quotes(): QuotePair;

  /**
   * Identifier kinds the quoting rules apply to.
   */
  quoteMode(): QuoteModeName;

  /**
   * When quotes are added.
   */
  quotePolicy(): QuotePolicyName;

  /**
   * Whether the value collides with a reserved word of the dialect.
   */
  isReserved(value: string): boolean;
}
