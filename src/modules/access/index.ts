export { AccessModule } from "./access.module";
export { RoleAccessPolicy } from "./role-access-policy";
export { ACCESS_POLICY, VaultRole } from "./access-policy.interface";
export type { AccessPolicy } from "./access-policy.interface";
