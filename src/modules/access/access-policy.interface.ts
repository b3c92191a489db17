export enum VaultRole {
  Admin = "ADMIN",
  EmergencyAdmin = "EMERGENCY_ADMIN",
  Liquidator = "LIQUIDATOR",
}

export const ACCESS_POLICY = Symbol("ACCESS_POLICY");

/**
 * Capability check consulted by the vault before privileged operations.
 */
export interface AccessPolicy {
  hasRole(role: VaultRole, account: string): boolean;

  /** Throws InvalidCaller unless `account` holds one of `roles`. */
  assertRole(account: string, ...roles: VaultRole[]): void;

  grantRole(role: VaultRole, account: string): void;
  revokeRole(role: VaultRole, account: string): void;
  members(role: VaultRole): string[];
}
