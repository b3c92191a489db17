export { VaultModule } from "./vault.module";
export { VaultService } from "./vault.service";
export { LoanLifecycleService } from "./loan-lifecycle.service";
export { NoteAdapterRegistry } from "./note-adapter.registry";
export * from "./adapters";
export * from "./interfaces";
export * from "./vault.types";
export * from "./vault.http";
