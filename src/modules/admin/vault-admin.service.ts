import { Inject, Injectable, Logger } from "@nestjs/common";
import { FIXED_POINT_SCALE } from "../../common/fixed-point";
import { VaultException } from "../../common/errors";
import { normalizeAddress } from "../../common/validation";
import { ACCESS_POLICY, AccessPolicy, VaultRole } from "../access";
import { KeeperService, UpkeepItem, UpkeepOutcome } from "../keeper";
import {
  EncodedSnapshot,
  LedgerService,
  Tranche,
  VaultParameters,
  resetInsolventTranche,
  trancheName,
} from "../ledger";
import {
  CollateralParametersRegistry,
  RateComponentWeights,
  RateModel,
  RateModelAnchors,
  buildRateModel,
} from "../pricing";

export interface CollateralParametersInput {
  enabled: boolean;
  collateralValue: bigint;
  loanToValueModel: RateModelAnchors;
  durationModel: RateModelAnchors;
  weights: RateComponentWeights;
}

/**
 * Bounded administration. Every call names the acting account (`subject`)
 * and is checked against the access policy before anything changes.
 */
@Injectable()
export class VaultAdminService {
  private readonly logger = new Logger(VaultAdminService.name);

  constructor(
    private readonly ledger: LedgerService,
    private readonly pricingParameters: CollateralParametersRegistry,
    private readonly keeper: KeeperService,
    @Inject(ACCESS_POLICY) private readonly access: AccessPolicy,
  ) {}

  // ── Vault parameters ───────────────────────────────────────────────────────

  parameters(): VaultParameters {
    return this.ledger.read((state) => ({ ...state.parameters }));
  }

  /** Per-second fixed-point rate, strictly between 0 and 1.0. */
  async setSeniorTrancheRate(subject: string, rate: bigint): Promise<void> {
    this.access.assertRole(subject, VaultRole.Admin);
    if (rate <= 0n || rate >= FIXED_POINT_SCALE) {
      throw new VaultException("ParameterOutOfRange", `Senior tranche rate ${rate} out of (0, 1e18)`);
    }
    await this.ledger.execute("set-senior-rate", (tx) => {
      tx.draft.parameters.seniorTrancheRate = rate;
    });
    this.logger.log(`[admin_param] subject=${subject} seniorTrancheRate=${rate}`);
  }

  async setReserveRatio(subject: string, ratio: bigint): Promise<void> {
    this.access.assertRole(subject, VaultRole.Admin);
    if (ratio < 0n || ratio >= FIXED_POINT_SCALE) {
      throw new VaultException("ParameterOutOfRange", `Reserve ratio ${ratio} out of [0, 1e18)`);
    }
    await this.ledger.execute("set-reserve-ratio", (tx) => {
      tx.draft.parameters.reserveRatio = ratio;
    });
    this.logger.log(`[admin_param] subject=${subject} reserveRatio=${ratio}`);
  }

  async setPaused(subject: string, paused: boolean): Promise<void> {
    this.access.assertRole(subject, VaultRole.Admin, VaultRole.EmergencyAdmin);
    await this.ledger.execute(paused ? "pause" : "unpause", (tx) => {
      tx.draft.parameters.paused = paused;
    });
    this.logger.warn(`[admin_pause] subject=${subject} paused=${paused}`);
  }

  // ── Pricing parameters ─────────────────────────────────────────────────────

  setUtilizationModel(subject: string, anchors: RateModelAnchors): RateModel {
    this.access.assertRole(subject, VaultRole.Admin);
    const model = buildRateModel(anchors);
    this.pricingParameters.setUtilizationModel(model);
    return model;
  }

  setCollateralParameters(subject: string, collateralToken: string, input: CollateralParametersInput): void {
    this.access.assertRole(subject, VaultRole.Admin);
    this.pricingParameters.set(collateralToken, {
      enabled: input.enabled,
      collateralValue: input.collateralValue,
      loanToValueModel: buildRateModel(input.loanToValueModel),
      durationModel: buildRateModel(input.durationModel),
      weights: input.weights,
    });
  }

  // ── Roles ──────────────────────────────────────────────────────────────────

  grantRole(subject: string, role: VaultRole, account: string): void {
    this.access.assertRole(subject, VaultRole.Admin);
    this.access.grantRole(role, account);
  }

  revokeRole(subject: string, role: VaultRole, account: string): void {
    this.access.assertRole(subject, VaultRole.Admin);
    this.access.revokeRole(role, account);
  }

  roles(): Record<VaultRole, string[]> {
    return {
      [VaultRole.Admin]: this.access.members(VaultRole.Admin),
      [VaultRole.EmergencyAdmin]: this.access.members(VaultRole.EmergencyAdmin),
      [VaultRole.Liquidator]: this.access.members(VaultRole.Liquidator),
    };
  }

  // ── Recovery tooling ───────────────────────────────────────────────────────

  async resetInsolventTranche(subject: string, tranche: Tranche): Promise<bigint> {
    this.access.assertRole(subject, VaultRole.Admin);
    const forfeited = await this.ledger.execute("reset-insolvent-tranche", (tx) =>
      resetInsolventTranche(tx.draft, tranche),
    );
    this.logger.warn(
      `[admin_tranche_reset] subject=${subject} tranche=${trancheName(tranche)} forfeitedShares=${forfeited}`,
    );
    return forfeited;
  }

  exportSnapshot(subject: string): EncodedSnapshot & { sequence: number } {
    this.access.assertRole(subject, VaultRole.Admin);
    const snapshot = this.ledger.snapshot();
    this.logger.log(`[admin_snapshot] subject=${subject} seq=${this.ledger.sequence} hash=${snapshot.stateHash}`);
    return { ...snapshot, sequence: this.ledger.sequence };
  }

  // ── Keeper ─────────────────────────────────────────────────────────────────

  checkUpkeep(subject: string): Promise<UpkeepItem[]> {
    this.access.assertRole(subject, VaultRole.Admin);
    return this.keeper.checkUpkeep();
  }

  performUpkeep(subject: string, items: UpkeepItem[]): Promise<UpkeepOutcome[]> {
    this.access.assertRole(subject, VaultRole.Admin);
    return this.keeper.performUpkeep(
      items.map((item) => ({ ...item, noteToken: normalizeAddress(item.noteToken) })),
    );
  }
}
