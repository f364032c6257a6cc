/**
 * SQLite Dialect Implementation
 *
 * SQLite accepts double quotes, brackets and backticks around identifiers;
 * backticks are emitted so statements stay portable to MySQL.
 *
 * @module quotewright/drivers/sqlite
 */

import { SqlDialect } from "../sql/sql-dialect";
import reservedWords from "./reserved-words.json";

export class SqliteDialect extends SqlDialect {
  public readonly name = "sqlite" as const;

  public constructor() {
    super("`", "`", reservedWords);
  }
}
