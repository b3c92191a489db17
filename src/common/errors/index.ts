export * from "./vault.exception";
