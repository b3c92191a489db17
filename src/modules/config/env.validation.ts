import {
  IsBoolean,
  IsEnum,
  IsInt,
  IsOptional,
  IsString,
  Matches,
  Max,
  Min,
  MinLength,
  ValidateIf,
  validateSync,
} from "class-validator";
import { Transform, plainToInstance } from "class-transformer";

export enum Environment {
  Development = "development",
  Staging = "staging",
  Production = "production",
  Test = "test",
}

/** Returns true when we are NOT running in Jest / unit-test mode. */
const notTest = (o: EnvironmentVariables) => o.NODE_ENV !== Environment.Test;

const DECIMAL = /^\d+(\.\d{1,18})?$/;
const FRACTION = /^0(\.\d{1,18})?$/;
const ADDRESS_LIST = /^(0x[0-9a-fA-F]{40})(\s*,\s*0x[0-9a-fA-F]{40})*$/;

export class EnvironmentVariables {
  @IsEnum(Environment)
  NODE_ENV: Environment = Environment.Development;

  @Transform(({ value }) => parseInt(value, 10))
  @IsInt()
  @Min(1)
  @Max(65535)
  PORT: number = 3000;

  /**
   * Admin API key - protects /admin/* routes.
   * Required at startup; no fail-open fallback.
   */
  @IsString()
  @MinLength(16)
  ADMIN_API_KEY!: string;

  /** Comma-separated list of allowed CORS origins. */
  @IsString()
  @MinLength(1)
  CORS_ORIGINS!: string;

  // ── Vault economics ────────────────────────────────────────────────────────

  /** Annual simple rate owed to senior, e.g. "0.05". */
  @Matches(DECIMAL, { message: "VAULT_SENIOR_TRANCHE_RATE must be a decimal rate" })
  VAULT_SENIOR_TRANCHE_RATE: string = "0.05";

  /** Fraction of free cash held back from redemptions, in [0, 1). */
  @Matches(FRACTION, { message: "VAULT_RESERVE_RATIO must be a decimal in [0, 1)" })
  VAULT_RESERVE_RATIO: string = "0.10";

  @Transform(({ value }) => parseInt(value, 10))
  @IsInt()
  @Min(1)
  VAULT_TIME_BUCKET_SECONDS: number = 7 * 86_400;

  @Transform(({ value }) => parseInt(value, 10))
  @IsInt()
  @Min(1)
  @Max(52)
  VAULT_PRORATION_BUCKETS: number = 6;

  // ── Pricing ────────────────────────────────────────────────────────────────

  @Transform(({ value }) => parseInt(value, 10))
  @IsInt()
  @Min(0)
  PRICING_MIN_TIME_REMAINING_SECONDS: number = 7 * 86_400;

  /** Max |offered − recomputed| purchase price, base units. */
  @Matches(/^\d+$/, { message: "PRICING_QUOTE_TOLERANCE must be a non-negative integer" })
  PRICING_QUOTE_TOLERANCE: string = "0";

  // ── Roles ──────────────────────────────────────────────────────────────────
  // Admin holders are required outside tests so the vault is never
  // deployed without anyone able to pause it.

  @ValidateIf(notTest)
  @Matches(ADDRESS_LIST, { message: "VAULT_ADMIN_ACCOUNTS must be a comma-separated address list" })
  VAULT_ADMIN_ACCOUNTS?: string;

  @IsOptional()
  @Matches(ADDRESS_LIST, { message: "VAULT_LIQUIDATOR_ACCOUNTS must be a comma-separated address list" })
  VAULT_LIQUIDATOR_ACCOUNTS?: string;

  @IsOptional()
  @Matches(ADDRESS_LIST, {
    message: "VAULT_EMERGENCY_ADMIN_ACCOUNTS must be a comma-separated address list",
  })
  VAULT_EMERGENCY_ADMIN_ACCOUNTS?: string;

  // ── Automation and persistence ─────────────────────────────────────────────

  // read from the raw object: implicit conversion would turn "false" into true
  @Transform(({ obj }) => obj.KEEPER_ENABLED === true || obj.KEEPER_ENABLED === "true")
  @IsBoolean()
  KEEPER_ENABLED: boolean = false;

  @IsOptional()
  @IsString()
  @MinLength(1)
  LEDGER_SNAPSHOT_PATH?: string;

  /** Registers the in-memory lending platform under this note token. */
  @IsOptional()
  @Matches(/^0x[0-9a-fA-F]{40}$/, { message: "SIMULATION_NOTE_TOKEN must be an address" })
  SIMULATION_NOTE_TOKEN?: string;
}

export function validate(config: Record<string, unknown>): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(validated, {
    skipMissingProperties: false,
  });
  if (errors.length > 0) {
    throw new Error(
      `Environment validation failed:\n${errors
        .map((e) => Object.values(e.constraints ?? {}).join(", "))
        .join("\n")}`,
    );
  }
  return validated;
}
