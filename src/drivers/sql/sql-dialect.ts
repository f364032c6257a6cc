import type { SqlDialectContract } from "./sql-dialect.contract";

/**
 * Shared implementation for dialects that differ only in their quote
 * characters and reserved word list.
 */
export abstract class SqlDialect implements SqlDialectContract {
  /**
   * Dialect name identifier.
   */
  public abstract readonly name: string;

  /**
   * Upper-cased reserved words.
   */
  public readonly reservedWords: ReadonlySet<string>;

  /**
   * @param openQuote - Character opening a quoted identifier
   * @param closeQuote - Character closing a quoted identifier
   * @param reservedWords - Reserved words, in any case
   */
  protected constructor(
    protected readonly openQuote: string,
    protected readonly closeQuote: string,
    reservedWords: readonly string[],
  ) {
    this.reservedWords = new Set(reservedWords.map((word) => word.toUpperCase()));
  }

  public quote(identifier: string): string {
    return `${this.openQuote}${identifier}${this.closeQuote}`;
  }

  public isReserved(word: string): boolean {
    return this.reservedWords.has(word.toUpperCase());
  }
}
