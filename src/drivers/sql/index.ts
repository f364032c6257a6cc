/**
 * SQL Driver Exports
 *
 * Central export file for shared SQL infrastructure.
 *
 * @module quotewright/drivers/sql
 */

export * from "./sql-dialect";
export * from "./sql-dialect.contract";
