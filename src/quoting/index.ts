export * from "./quote";
export * from "./quote-normalizer";
export * from "./quote-policy";
export * from "./quoter";
