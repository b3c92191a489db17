import { Injectable, Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { VaultException } from "../../common/errors";
import { normalizeAddress, parseAddressList } from "../../common/validation";
import { AccessPolicy, VaultRole } from "./access-policy.interface";

const ROLE_ENV: Record<VaultRole, string> = {
  [VaultRole.Admin]: "VAULT_ADMIN_ACCOUNTS",
  [VaultRole.EmergencyAdmin]: "VAULT_EMERGENCY_ADMIN_ACCOUNTS",
  [VaultRole.Liquidator]: "VAULT_LIQUIDATOR_ACCOUNTS",
};

/** In-process role table seeded from configuration. */
@Injectable()
export class RoleAccessPolicy implements AccessPolicy {
  private readonly logger = new Logger(RoleAccessPolicy.name);
  private readonly holders = new Map<VaultRole, Set<string>>();

  constructor(config: ConfigService) {
    for (const role of Object.values(VaultRole)) {
      const accounts = parseAddressList(config.get<string>(ROLE_ENV[role]));
      this.holders.set(role, new Set(accounts));
      if (accounts.length > 0) {
        this.logger.log(`[access_seed] role=${role} accounts=${accounts.length}`);
      }
    }
  }

  hasRole(role: VaultRole, account: string): boolean {
    const normalized = this.tryNormalize(account);
    return normalized !== null && (this.holders.get(role)?.has(normalized) ?? false);
  }

  assertRole(account: string, ...roles: VaultRole[]): void {
    if (!roles.some((role) => this.hasRole(role, account))) {
      throw new VaultException("InvalidCaller", `${account} lacks role ${roles.join(" or ")}`);
    }
  }

  grantRole(role: VaultRole, account: string): void {
    const normalized = normalizeAddress(account);
    this.roleSet(role).add(normalized);
    this.logger.log(`[access_grant] role=${role} account=${normalized}`);
  }

  revokeRole(role: VaultRole, account: string): void {
    const normalized = normalizeAddress(account);
    this.roleSet(role).delete(normalized);
    this.logger.log(`[access_revoke] role=${role} account=${normalized}`);
  }

  members(role: VaultRole): string[] {
    return [...this.roleSet(role)].sort();
  }

  private roleSet(role: VaultRole): Set<string> {
    let set = this.holders.get(role);
    if (!set) {
      set = new Set();
      this.holders.set(role, set);
    }
    return set;
  }

  private tryNormalize(account: string): string | null {
    try {
      return normalizeAddress(account);
    } catch {
      return null;
    }
  }
}
