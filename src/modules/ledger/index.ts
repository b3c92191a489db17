export { LedgerModule } from "./ledger.module";
export { LedgerService, vaultParametersFromConfig } from "./ledger.service";
export { LedgerTransactionRunner } from "./ledger-transaction-runner";
export type { CommitListener, LedgerTransaction } from "./ledger-transaction-runner";
export * from "./ledger.types";
export * from "./ledger-snapshot";
export * from "./tranche-accounting";
export * from "./redemption-queue";
export * from "./loan-book";
export * from "./time-buckets";
export * from "./vault-ledger";
