import type { QuotePair, QuoterContract } from "../contracts/quoter.contract";
import type { SqlDialectContract } from "../drivers/sql/sql-dialect.contract";
import { QuoterConfigurationError } from "../errors/quoter-configuration.error";
import { QuoteMode, QuotePolicy, type QuoteModeName, type QuotePolicyName } from "../types";
import { getQuotingConfig } from "../config";

/**
 * Options accepted by quoting capabilities.
 */
export type QuoterOptions = {
  /**
   * Identifier kinds the quoting rules apply to.
   *
   * @default the configured `quoteMode`
   */
  quoteMode?: QuoteModeName;
  /**
   * When quotes are added.
   *
   * @default the configured `quotePolicy`
   */
  quotePolicy?: QuotePolicyName;
};

const quoteModes: readonly string[] = Object.values(QuoteMode);
const quotePolicies: readonly string[] = Object.values(QuotePolicy);

function isQuoteMode(value: unknown): value is QuoteModeName {
  return typeof value === "string" && quoteModes.includes(value);
}

function isQuotePolicy(value: unknown): value is QuotePolicyName {
  return typeof value === "string" && quotePolicies.includes(value);
}

/**
 * Resolved mode, policy and quote pair of a capability.
 */
export type ResolvedQuoterOptions = {
  quoteMode: QuoteModeName;
  quotePolicy: QuotePolicyName;
  quotes: QuotePair;
};

/**
 * Fill missing options from the configuration and validate the result
 * against the dialect.
 *
 * @throws QuoterConfigurationError for unknown modes or policies and for
 * dialects whose quote pair is not two characters long
 */
export function resolveQuoterOptions(
  dialect: SqlDialectContract,
  options: QuoterOptions = {},
): ResolvedQuoterOptions {
  const quoteMode: unknown = options.quoteMode ?? getQuotingConfig("quoteMode");
  const quotePolicy: unknown = options.quotePolicy ?? getQuotingConfig("quotePolicy");

  if (!isQuoteMode(quoteMode)) {
    throw new QuoterConfigurationError(
      `Unknown quote mode "${String(quoteMode)}", expected one of: ${quoteModes.join(", ")}.`,
      "quoteMode",
      quoteMode,
    );
  }

  if (!isQuotePolicy(quotePolicy)) {
    throw new QuoterConfigurationError(
      `Unknown quote policy "${String(quotePolicy)}", expected one of: ${quotePolicies.join(", ")}.`,
      "quotePolicy",
      quotePolicy,
    );
  }

  const pair = dialect.quote("");

  if (pair.length !== 2) {
    throw new QuoterConfigurationError(
      `Dialect "${dialect.name}" must quote with exactly two characters, got "${pair}".`,
      "quotes",
      pair,
    );
  }

  return {
    quoteMode,
    quotePolicy,
    quotes: [pair[0], pair[1]],
  };
}

/**
 * Standalone quoting capability bound to a dialect.
 *
 * The dialect is borrowed, not owned; mode and policy are fixed at
 * construction.
 *
 * @example
 * ```typescript
 * const quoter = new Quoter(new MySqlDialect(), {
 *   quoteMode: QuoteMode.ColumnsOnly,
 * });
 *
 * quote(quoter, "users", false); // 'users'
 * quote(quoter, "id", true);     // '`id`'
 * ```
 */
export class Quoter implements QuoterContract {
  private readonly options: ResolvedQuoterOptions;

  public constructor(
    public readonly dialect: SqlDialectContract,
    options?: QuoterOptions,
  ) {
    this.options = resolveQuoterOptions(dialect, options);
  }

  public quotes(): QuotePair {
    return this.options.quotes;
  }

  public quoteMode(): QuoteModeName {
    return this.options.quoteMode;
  }

  public quotePolicy(): QuotePolicyName {
    return this.options.quotePolicy;
  }

  public isReserved(value: string): boolean {
    return this.dialect.isReserved(value);
  }
}
