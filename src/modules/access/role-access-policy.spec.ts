import { ConfigService } from "@nestjs/config";
import { VaultException } from "../../common/errors";
import { VaultRole } from "./access-policy.interface";
import { RoleAccessPolicy } from "./role-access-policy";

const ADMIN = "0x1000000000000000000000000000000000000001";
const LIQUIDATOR = "0x2000000000000000000000000000000000000002";
const STRANGER = "0x3000000000000000000000000000000000000003";
// lowercase hex is valid; checksum form is what gets stored
const MIXED_CASE = "0xabcdefabcdefabcdefabcdefabcdefabcdefabcd";

function makePolicy(env: Record<string, string | undefined>): RoleAccessPolicy {
  const config = { get: (key: string) => env[key] } as unknown as ConfigService;
  return new RoleAccessPolicy(config);
}

describe("RoleAccessPolicy", () => {
  it("seeds role holders from configuration", () => {
    const policy = makePolicy({
      VAULT_ADMIN_ACCOUNTS: ADMIN,
      VAULT_LIQUIDATOR_ACCOUNTS: `${LIQUIDATOR}, ${ADMIN}`,
    });
    expect(policy.hasRole(VaultRole.Admin, ADMIN)).toBe(true);
    expect(policy.hasRole(VaultRole.Liquidator, ADMIN)).toBe(true);
    expect(policy.hasRole(VaultRole.Admin, LIQUIDATOR)).toBe(false);
    expect(policy.members(VaultRole.EmergencyAdmin)).toEqual([]);
  });

  it("throws InvalidCaller when no listed role is held", () => {
    const policy = makePolicy({ VAULT_ADMIN_ACCOUNTS: ADMIN });
    expect(() => policy.assertRole(STRANGER, VaultRole.Admin, VaultRole.EmergencyAdmin)).toThrow(
      new VaultException("InvalidCaller", `${STRANGER} lacks role ADMIN or EMERGENCY_ADMIN`),
    );
    expect(() => policy.assertRole(ADMIN, VaultRole.Admin, VaultRole.EmergencyAdmin)).not.toThrow();
  });

  it("matches accounts regardless of hex case", () => {
    const policy = makePolicy({});
    policy.grantRole(VaultRole.Liquidator, MIXED_CASE);
    expect(policy.hasRole(VaultRole.Liquidator, MIXED_CASE.toUpperCase().replace("0X", "0x"))).toBe(true);
  });

  it("grants and revokes", () => {
    const policy = makePolicy({});
    policy.grantRole(VaultRole.Liquidator, LIQUIDATOR);
    expect(policy.members(VaultRole.Liquidator)).toEqual([LIQUIDATOR]);
    policy.revokeRole(VaultRole.Liquidator, LIQUIDATOR);
    expect(policy.hasRole(VaultRole.Liquidator, LIQUIDATOR)).toBe(false);
  });

  it("refuses to grant the zero address", () => {
    const policy = makePolicy({});
    expect(() => policy.grantRole(VaultRole.Admin, "0x0000000000000000000000000000000000000000")).toThrow(
      "Zero address not allowed",
    );
  });

  it("treats a malformed account as holding nothing", () => {
    const policy = makePolicy({ VAULT_ADMIN_ACCOUNTS: ADMIN });
    expect(policy.hasRole(VaultRole.Admin, "not-an-address")).toBe(false);
  });
});
