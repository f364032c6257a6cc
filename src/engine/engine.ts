import { colors } from "@mongez/copper";
import { log } from "@warlock.js/logger";
import { getQuotingDebugLevel } from "../config";
import type { QuotePair, QuoterContract } from "../contracts/quoter.contract";
import type { SqlDialectContract } from "../drivers/sql/sql-dialect.contract";
import { QuoterConfigurationError } from "../errors/quoter-configuration.error";
import { quote, quoteColumns, quoteJoin, unquote } from "../quoting/quote";
import { resolveQuoterOptions, type QuoterOptions } from "../quoting/quoter";
import type { QuoteModeName, QuotePolicyName } from "../types";

/**
 * Configuration options used when creating an engine.
 */
export type EngineOptions = QuoterOptions & {
  /** Dialect owned by the engine. */
  dialect: SqlDialectContract;
};

function resolveEngineOptions(options: EngineOptions) {
  try {
    return resolveQuoterOptions(options.dialect, options);
  } catch (error) {
    if (error instanceof QuoterConfigurationError) {
      log.error("database", "quoter", error.message);
    }

    throw error;
  }
}

/**
 * Owner of the active dialect, exposing identifier quoting to the
 * statement builder.
 *
 * Mode and policy are resolved once, from the options or the configuration,
 * and never change afterwards. Quote characters and reserved words are read
 * from the dialect.
 *
 * @example
 * ```typescript
 * const engine = new Engine({
 *   dialect: new PostgresDialect(),
 *   quotePolicy: QuotePolicy.AddReserved,
 * });
 *
 * engine.quote("user", false);       // '"user"'
 * engine.quote("accounts", false);   // 'accounts'
 * engine.quoteColumns("id,order");   // 'id,"order"'
 * ```
 */
export class Engine implements QuoterContract {
  /** Dialect used for quote characters and reserved words. */
  public readonly dialect: SqlDialectContract;

  private readonly mode: QuoteModeName;
  private readonly policy: QuotePolicyName;

  /**
   * Create a new engine.
   *
   * @throws QuoterConfigurationError when the mode, policy or dialect quotes are invalid
   */
  public constructor(options: EngineOptions) {
    this.dialect = options.dialect;

    const resolved = resolveEngineOptions(options);
    this.mode = resolved.quoteMode;
    this.policy = resolved.quotePolicy;

    if (getQuotingDebugLevel() === "info") {
      log.info(
        "database",
        "quoter",
        `Quoting ${colors.bold(colors.yellowBright(this.dialect.name))} identifiers with mode ${colors.cyan(this.mode)} and policy ${colors.cyan(this.policy)}`,
      );
    }
  }

  public quotes(): QuotePair {
    const pair = this.dialect.quote("");
    return [pair[0], pair[1]];
  }

  public quoteMode(): QuoteModeName {
    return this.mode;
  }

  public quotePolicy(): QuotePolicyName {
    return this.policy;
  }

  public isReserved(value: string): boolean {
    return this.dialect.isReserved(value);
  }

  /**
   * Quote a table (`isColumn = false`) or column identifier.
   */
  public quote(value: string, isColumn: boolean): string {
    return quote(this, value, isColumn);
  }

  /**
   * Quote a comma-separated column list.
   */
  public quoteColumns(columns: string): string {
    return quoteColumns(this, columns);
  }

  /**
   * Quote columns and join them with a comma.
   */
  public quoteJoin(columns: readonly string[]): string {
    return quoteJoin(this, columns);
  }

  /**
   * Strip this engine's quote characters from both ends of a value.
   */
  public unquote(value: string): string {
    return unquote(this, value);
  }
}
