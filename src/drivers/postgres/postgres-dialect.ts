/**
 * PostgreSQL Dialect Implementation
 *
 * Implements the SqlDialectContract for PostgreSQL identifier rules:
 * double-quoted identifiers and the keywords PostgreSQL reserves.
 *
 * @module quotewright/drivers/postgres
 */

import { SqlDialect } from "../sql/sql-dialect";
import reservedWords from "./reserved-words.json";

/**
 * PostgreSQL-specific SQL dialect implementation.
 *
 * @example
 * ```typescript
 * const dialect = new PostgresDialect();
 *
 * dialect.quote("user"); // '"user"'
 * dialect.isReserved("user"); // true
 * ```
 */
export class PostgresDialect extends SqlDialect {
  /**
   * Dialect name identifier.
   */
  public readonly name = "postgres" as const;

  public constructor() {
    super('"', '"', reservedWords);
  }
}
