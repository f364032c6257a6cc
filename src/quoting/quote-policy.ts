import { QuoteMode, QuotePolicy, type QuoteModeName, type QuotePolicyName } from "../types";

/**
 * Whether quoting rules cover the identifier kind under the given mode.
 */
export function isModeApplicable(isColumn: boolean, mode: QuoteModeName): boolean {
  if (mode === QuoteMode.TableAndColumns) return true;

  return isColumn ? mode === QuoteMode.ColumnsOnly : mode === QuoteMode.TableOnly;
}

/**
 * Decide whether an identifier has to be quoted.
 *
 * A `false` result means the value is emitted verbatim, without any
 * normalization of quotes it may already carry.
 *
 * @param isColumn - `true` for column-like identifiers, `false` for table-like ones
 * @param value - The raw identifier, checked as given against the reserved words
 * @param isReserved - Reserved word test of the active dialect
 *
 * @example
 * ```typescript
 * shouldQuote(true, QuoteMode.TableOnly, QuotePolicy.AddAlways, "id", isReserved); // false
 * shouldQuote(false, QuoteMode.TableOnly, QuotePolicy.AddAlways, "users", isReserved); // true
 * shouldQuote(true, QuoteMode.TableAndColumns, QuotePolicy.AddReserved, "order", isReserved); // true
 * ```
 */
export function shouldQuote(
  isColumn: boolean,
  mode: QuoteModeName,
  policy: QuotePolicyName,
  value: string,
  isReserved: (value: string) => boolean,
): boolean {
  if (!isModeApplicable(isColumn, mode)) return false;

  switch (policy) {
    case QuotePolicy.AddAlways:
      return true;
    case QuotePolicy.AddReserved:
      return isReserved(value);
    case QuotePolicy.NoAdd:
      return false;
  }
}
