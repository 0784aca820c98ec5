import type { StoreStats } from "./types";

export function emptyStats(): StoreStats {
  return {
    totalDocuments: 0,
    stored: 0,
    failed: 0,
    byType: {
      capital_call: 0,
      distribution_notice: 0,
      valuation_report: 0,
      quarterly_update: 0,
      unclassified: 0,
    },
    byErrorCode: {},
    events: 0,
    runs: 0,
  };
}
