export * from "./asset-transfer.interface";
export * from "./collateral-custody.interface";
export * from "./note-adapter.interface";
