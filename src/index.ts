// Configuration
export * from "./config";
export * from "./types";

// Contracts
export * from "./contracts/quoter.contract";

// Errors
export * from "./errors/quoter-configuration.error";

// Quoting
export * from "./quoting";

// Engine
export * from "./engine/engine";

// SQL Dialects
export * from "./drivers/sql";
export * from "./drivers/mssql/mssql-dialect";
export * from "./drivers/mysql/mysql-dialect";
export * from "./drivers/postgres/postgres-dialect";
export * from "./drivers/sqlite/sqlite-dialect";
