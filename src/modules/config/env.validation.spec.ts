import "reflect-metadata";
import { plainToInstance } from "class-transformer";
import { validateSync } from "class-validator";
import { EnvironmentVariables, validate as validateConfig } from "./env.validation";

function validate(input: Record<string, unknown>) {
  const instance = plainToInstance(EnvironmentVariables, input, {
    enableImplicitConversion: true,
  });
  return validateSync(instance, { skipMissingProperties: false });
}

const VALID_BASE = {
  NODE_ENV: "test",
  PORT: "3000",
  ADMIN_API_KEY: "test-admin-key-0000",
  CORS_ORIGINS: "http://localhost:3001",
};

const ADMIN = "0x1000000000000000000000000000000000000001";
const LIQUIDATOR = "0x2000000000000000000000000000000000000002";

describe("EnvironmentVariables validation", () => {
  it("passes with all required vars present", () => {
    expect(validate(VALID_BASE)).toHaveLength(0);
  });

  it("fills vault defaults", () => {
    const config = validateConfig(VALID_BASE);
    expect(config.VAULT_SENIOR_TRANCHE_RATE).toBe("0.05");
    expect(config.VAULT_RESERVE_RATIO).toBe("0.10");
    expect(config.VAULT_TIME_BUCKET_SECONDS).toBe(604800);
    expect(config.VAULT_PRORATION_BUCKETS).toBe(6);
    expect(config.PRICING_MIN_TIME_REMAINING_SECONDS).toBe(604800);
    expect(config.KEEPER_ENABLED).toBe(false);
  });

  it("parses KEEPER_ENABLED from its string form", () => {
    expect(validateConfig({ ...VALID_BASE, KEEPER_ENABLED: "true" }).KEEPER_ENABLED).toBe(true);
    expect(validateConfig({ ...VALID_BASE, KEEPER_ENABLED: "false" }).KEEPER_ENABLED).toBe(false);
  });

  it("fails when ADMIN_API_KEY is missing", () => {
    const { ADMIN_API_KEY: _, ...rest } = VALID_BASE;
    const errors = validate(rest);
    expect(errors.some((e) => e.property === "ADMIN_API_KEY")).toBe(true);
  });

  it("fails when ADMIN_API_KEY is shorter than 16 chars", () => {
    const errors = validate({ ...VALID_BASE, ADMIN_API_KEY: "tooshort" });
    expect(errors.some((e) => e.property === "ADMIN_API_KEY")).toBe(true);
  });

  it("fails when NODE_ENV is an invalid value", () => {
    const errors = validate({ ...VALID_BASE, NODE_ENV: "banana" });
    expect(errors.some((e) => e.property === "NODE_ENV")).toBe(true);
  });

  it("fails when the reserve ratio is 1 or more", () => {
    const errors = validate({ ...VALID_BASE, VAULT_RESERVE_RATIO: "1.0" });
    expect(errors.some((e) => e.property === "VAULT_RESERVE_RATIO")).toBe(true);
  });

  it("fails when the proration horizon is zero", () => {
    const errors = validate({ ...VALID_BASE, VAULT_PRORATION_BUCKETS: "0" });
    expect(errors.some((e) => e.property === "VAULT_PRORATION_BUCKETS")).toBe(true);
  });

  it("requires admin accounts outside test", () => {
    const production = { ...VALID_BASE, NODE_ENV: "production" };
    expect(validate(production).some((e) => e.property === "VAULT_ADMIN_ACCOUNTS")).toBe(true);
    expect(validate({ ...production, VAULT_ADMIN_ACCOUNTS: ADMIN })).toHaveLength(0);
  });

  it("accepts comma-separated role lists and rejects garbage", () => {
    expect(validate({ ...VALID_BASE, VAULT_LIQUIDATOR_ACCOUNTS: `${ADMIN}, ${LIQUIDATOR}` })).toHaveLength(0);
    const errors = validate({ ...VALID_BASE, VAULT_LIQUIDATOR_ACCOUNTS: "0xnope" });
    expect(errors.some((e) => e.property === "VAULT_LIQUIDATOR_ACCOUNTS")).toBe(true);
  });

  it("reports every violation in one boot error", () => {
    expect(() => validateConfig({ NODE_ENV: "test" })).toThrow(/Environment validation failed/);
  });

  it("names each missing required variable", () => {
    let message = "";
    try {
      validateConfig({});
    } catch (err) {
      message = err instanceof Error ? err.message : String(err);
    }
    expect(message).toContain("ADMIN_API_KEY must be longer than or equal to 16 characters");
    expect(message).toContain("CORS_ORIGINS must be longer than or equal to 1 characters");
  });
});
