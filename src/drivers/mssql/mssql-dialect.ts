/**
 * SQL Server Dialect Implementation
 *
 * @module quotewright/drivers/mssql
 */

import { SqlDialect } from "../sql/sql-dialect";
import reservedWords from "./reserved-words.json";

/**
 * SQL Server dialect: bracket-quoted identifiers.
 *
 * The opening and closing characters differ, so an identifier that was
 * quoted for another dialect with backticks is rewritten to `[name]`.
 *
 * @example
 * ```typescript
 * const dialect = new MsSqlDialect();
 *
 * dialect.quote("");    // '[]'
 * dialect.quote("key"); // '[key]'
 * ```
 */
export class MsSqlDialect extends SqlDialect {
  public readonly name = "mssql" as const;

  public constructor() {
    super("[", "]", reservedWords);
  }
}
