/**
 * Identifier kinds the quoting rules apply to.
 *
 * - `TableAndColumns`: both table-like and column-like identifiers
 * - `TableOnly`: table-like identifiers only
 * - `ColumnsOnly`: column-like identifiers only
 */
export const QuoteMode = {
  TableAndColumns: "tableAndColumns",
  TableOnly: "tableOnly",
  ColumnsOnly: "columnsOnly",
} as const;

export type QuoteModeName = (typeof QuoteMode)[keyof typeof QuoteMode];

/**
 * When quotes are added to an identifier the mode covers.
 *
 * - `AddAlways`: every identifier is quoted
 * - `NoAdd`: identifiers are emitted as given
 * - `AddReserved`: only reserved words of the active dialect are quoted
 */
export const QuotePolicy = {
  AddAlways: "addAlways",
  NoAdd: "noAdd",
  AddReserved: "addReserved",
} as const;

export type QuotePolicyName = (typeof QuotePolicy)[keyof typeof QuotePolicy];

export type QuotingConfigurations = {
  /**
   * Quote mode used when an engine or quoter is created without one
   *
   * @default `tableAndColumns`
   */
  quoteMode?: QuoteModeName;
  /**
   * Quote policy used when an engine or quoter is created without one
   *
   * @default `addAlways`
   */
  quotePolicy?: QuotePolicyName;
  /**
   * Debug level
   * Could be one of the following values: `error`, `warn`, `info`
   * @default `warn`
   */
  debugLevel?: "error" | "warn" | "info";
};
