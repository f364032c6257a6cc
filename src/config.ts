import { QuoteMode, QuotePolicy, type QuotingConfigurations } from "./types";

let configurations: QuotingConfigurations = {};

export function setQuotingConfigurations(quotingConfigurations: QuotingConfigurations) {
  configurations = {
    ...configurations,
    ...quotingConfigurations,
  };
}

export function resetQuotingConfigurations() {
  configurations = {};
}

export function getQuotingConfigurations(): Required<QuotingConfigurations> {
  return {
    quoteMode: configurations.quoteMode || QuoteMode.TableAndColumns,
    quotePolicy: configurations.quotePolicy || QuotePolicy.AddAlways,
    debugLevel: getQuotingDebugLevel(),
  };
}

export function getQuotingConfig<Key extends keyof QuotingConfigurations>(
  key: Key,
): Required<QuotingConfigurations>[Key] {
  return getQuotingConfigurations()[key];
}

export function getQuotingDebugLevel(): NonNullable<QuotingConfigurations["debugLevel"]> {
  return configurations.debugLevel || "warn";
}
