/**
 * SQL Dialect Contract
 *
 * Defines the interface for the database-specific identifier rules the
 * quoting engine consumes: the quote characters and the reserved words.
 *
 * @module quotewright/drivers/sql
 */

/**
 * Contract that SQL dialects must implement to take part in identifier quoting.
 *
 * Each SQL database (PostgreSQL, MySQL, SQLite, SQL Server) wraps identifiers
 * in different characters and reserves a different set of keywords.
 *
 * @example
 * ```typescript
 * class PostgresDialect implements SqlDialectContract {
 *   quote(identifier: string): string {
 *     return `"${identifier}"`;
 *   }
 * }
 *
 * class MySqlDialect implements SqlDialectContract {
 *   quote(identifier: string): string {
 *     return `\`${identifier}\``;
 *   }
 * }
 * ```
 */
export interface SqlDialectContract {
  /**
   * The name of the dialect for identification purposes.
   *
   * @example "postgres", "mysql", "sqlite", "mssql"
   */
  readonly name: string;

  /**
   * Upper-cased reserved words of the dialect.
   */
  readonly reservedWords: ReadonlySet<string>;

  /**
   * Wrap an identifier in the dialect's quote characters.
   *
   * No escaping takes place. Quoting the empty string yields the bare
   * quote pair, which is how the quoting engine reads the characters:
   * - PostgreSQL: `""`
   * - MySQL: ``` `` ```
   * - SQL Server: `[]`
   *
   * @example
   * ```typescript
   * dialect.quote("user"); // '"user"' for PostgreSQL
   * dialect.quote("");     // '""' for PostgreSQL
   * ```
   */
  quote(identifier: string): string;

  /**
   * Check whether a word is reserved, ignoring case.
   *
   * @example
   * ```typescript
   * dialect.isReserved("select"); // true
   * dialect.isReserved("users");  // false
   * ```
   */
  isReserved(word: string): boolean;
}
