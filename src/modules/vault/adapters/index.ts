export * from "./in-memory-asset-ledger";
export * from "./in-memory-custody";
export * from "./in-memory-lending-platform";
