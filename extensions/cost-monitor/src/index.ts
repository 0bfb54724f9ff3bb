export { registerCostMonitorCli, type CostMonitorCliOptions } from "./cli.js";
export { parseCostMonitorConfig, loadCostMonitorConfig, type CostMonitorConfig } from "./config.js";
export * from "./errors.js";
export { estimateDailyCost, findOptimisations } from "./estimator.js";
export { bytesToGb, formatBytes, priceEgress, priceEgressGb } from "./egress.js";
export { recordFired, shouldFire, parseLedger, serializeLedger, DEFAULT_COOLDOWN_SECONDS } from "./ledger.js";
export { FileAlertLedgerStore, MemoryAlertLedgerStore, type AlertLedgerStore } from "./ledger-store.js";
export { buildAlertCandidates, evaluateAlerts, type AlertDispatcher, type AlertOutcome } from "./pipeline.js";
export { createRateTable, type RateTable } from "./rates.js";
export { SlackNotifier } from "./slack.js";
export * from "./types.js";
