/**
 * MySQL Dialect Implementation
 *
 * @module quotewright/drivers/mysql
 */

import { SqlDialect } from "../sql/sql-dialect";
import reservedWords from "./reserved-words.json";

/**
 * MySQL/MariaDB dialect: backtick-quoted identifiers.
 *
 * @example
 * ```typescript
 * const dialect = new MySqlDialect();
 *
 * dialect.quote("order"); // '`order`'
 * ```
 */
export class MySqlDialect extends SqlDialect {
  public readonly name = "mysql" as const;

  public constructor() {
    super("`", "`", reservedWords);
  }
}
