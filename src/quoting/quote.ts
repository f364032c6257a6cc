import type { QuoterContract } from "../contracts/quoter.contract";
import { normalizeIdentifier } from "./quote-normalizer";
import { shouldQuote } from "./quote-policy";

/**
 * Quote a single identifier according to the quoter's mode and policy.
 *
 * @param isColumn - `true` for column-like identifiers, `false` for table-like ones
 *
 * @example
 * ```typescript
 * quote(postgresQuoter, "public.users", false); // '"public"."users"'
 * quote(postgresQuoter, "`id`", true);          // '"id"'
 * ```
 */
export function quote(quoter: QuoterContract, value: string, isColumn: boolean): string {
  const isQuoted = shouldQuote(isColumn, quoter.quoteMode(), quoter.quotePolicy(), value, (word) =>
    quoter.isReserved(word),
  );

  if (!isQuoted) return value;

  const [prefix, suffix] = quoter.quotes();

  return normalizeIdentifier(value, prefix, suffix);
}

/**
 * Quote every column of a comma-separated list.
 *
 * @example
 * ```typescript
 * quoteColumns(mysqlQuoter, "id,name, email"); // '`id`,`name`,`email`'
 * ```
 */
export function quoteColumns(quoter: QuoterContract, columns: string): string {
  return quoteJoin(quoter, columns.split(","));
}

/**
 * Quote every column and join them with a comma.
 */
export function quoteJoin(quoter: QuoterContract, columns: readonly string[]): string {
  return columns.map((column) => quote(quoter, column, true)).join(",");
}

/**
 * Quote every item with a custom function and join them with `separator`
 * followed by a space.
 *
 * The input array is left untouched.
 *
 * @example
 * ```typescript
 * quoteJoinFunc(["id", "name"], (column) => engine.quote(column, true), ",");
 * // '"id", "name"'
 * ```
 */
export function quoteJoinFunc(
  items: readonly string[],
  quoteFn: (item: string) => string,
  separator: string,
): string {
  return items.map((item) => quoteFn(item)).join(`${separator} `);
}

/**
 * Strip the quoter's quote characters and backticks from both ends of a value.
 *
 * No attempt is made to match opening and closing characters.
 *
 * @example
 * ```typescript
 * unquote(postgresQuoter, '"users"'); // 'users'
 * unquote(postgresQuoter, '"public"."users"'); // 'public"."users'
 * ```
 */
export function unquote(quoter: QuoterContract, value: string): string {
  const [prefix, suffix] = quoter.quotes();
  const quoteCharacters = new Set([prefix, suffix, "`"]);

  let start = 0;
  let end = value.length;

  while (start < end && quoteCharacters.has(value[start])) start++;

  while (end > start && quoteCharacters.has(value[end - 1])) end--;

  return value.slice(start, end);
}
