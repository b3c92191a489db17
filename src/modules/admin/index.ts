export { AdminModule } from "./admin.module";
export { VaultAdminService } from "./vault-admin.service";
export type { CollateralParametersInput } from "./vault-admin.service";
