import { Body, Controller, Get, Headers, HttpCode, HttpStatus, Param, Post, UseGuards } from "@nestjs/common";
import { ApiKeyGuard } from "../../common/guards/api-key.guard";
import { parseTrancheParam, requireHeader } from "../vault";
import {
  CollateralParametersDto,
  PauseDto,
  PerformUpkeepDto,
  RateModelAnchorsDto,
  ReserveRatioDto,
  RoleChangeDto,
  SeniorTrancheRateDto,
} from "./dto";
import { VaultAdminService } from "./vault-admin.service";

/**
 * Operator routes. Requires x-api-key; the acting account comes from
 * x-admin-subject and must hold the matching vault role.
 *
 * Routes:
 *   GET  /admin/vault/parameters
 *   POST /admin/vault/senior-tranche-rate
 *   POST /admin/vault/reserve-ratio
 *   POST /admin/vault/pause                    - Admin or EmergencyAdmin
 *   POST /admin/vault/utilization-model
 *   POST /admin/vault/collateral/:token
 *   POST /admin/vault/roles/grant
 *   POST /admin/vault/roles/revoke
 *   POST /admin/vault/tranches/:tranche/reset
 *   GET  /admin/vault/snapshot
 *   GET  /admin/vault/keeper/check
 *   POST /admin/vault/keeper/perform
 */
@UseGuards(ApiKeyGuard)
@Controller("admin/vault")
export class VaultAdminController {
  constructor(private readonly admin: VaultAdminService) {}

  @Get("parameters")
  parameters() {
    const p = this.admin.parameters();
    return {
      seniorTrancheRate: p.seniorTrancheRate.toString(),
      reserveRatio: p.reserveRatio.toString(),
      paused: p.paused,
      timeBucketWidth: p.timeBucketWidth,
      prorationBuckets: p.prorationBuckets,
      roles: this.admin.roles(),
    };
  }

  @Post("senior-tranche-rate")
  @HttpCode(HttpStatus.OK)
  async setSeniorTrancheRate(
    @Headers("x-admin-subject") subject: string | undefined,
    @Body() dto: SeniorTrancheRateDto,
  ) {
    await this.admin.setSeniorTrancheRate(requireHeader(subject, "x-admin-subject"), dto.rate);
    return { seniorTrancheRate: dto.rate.toString() };
  }

  @Post("reserve-ratio")
  @HttpCode(HttpStatus.OK)
  async setReserveRatio(
    @Headers("x-admin-subject") subject: string | undefined,
    @Body() dto: ReserveRatioDto,
  ) {
    await this.admin.setReserveRatio(requireHeader(subject, "x-admin-subject"), dto.ratio);
    return { reserveRatio: dto.ratio.toString() };
  }

  @Post("pause")
  @HttpCode(HttpStatus.OK)
  async setPaused(@Headers("x-admin-subject") subject: string | undefined, @Body() dto: PauseDto) {
    await this.admin.setPaused(requireHeader(subject, "x-admin-subject"), dto.paused);
    return { paused: dto.paused };
  }

  @Post("utilization-model")
  @HttpCode(HttpStatus.OK)
  setUtilizationModel(
    @Headers("x-admin-subject") subject: string | undefined,
    @Body() dto: RateModelAnchorsDto,
  ) {
    const model = this.admin.setUtilizationModel(requireHeader(subject, "x-admin-subject"), dto);
    return {
      offset: model.offset.toString(),
      slope1: model.slope1.toString(),
      slope2: model.slope2.toString(),
      kink: model.kink.toString(),
      max: model.max.toString(),
    };
  }

  @Post("collateral/:token")
  @HttpCode(HttpStatus.OK)
  setCollateralParameters(
    @Param("token") token: string,
    @Headers("x-admin-subject") subject: string | undefined,
    @Body() dto: CollateralParametersDto,
  ) {
    const [utilizationWeight, loanToValueWeight, durationWeight] = dto.weights;
    this.admin.setCollateralParameters(requireHeader(subject, "x-admin-subject"), token, {
      enabled: dto.enabled,
      collateralValue: dto.collateralValue,
      loanToValueModel: dto.loanToValueModel,
      durationModel: dto.durationModel,
      weights: [utilizationWeight, loanToValueWeight, durationWeight],
    });
    return { ok: true };
  }

  @Post("roles/grant")
  @HttpCode(HttpStatus.OK)
  grantRole(@Headers("x-admin-subject") subject: string | undefined, @Body() dto: RoleChangeDto) {
    this.admin.grantRole(requireHeader(subject, "x-admin-subject"), dto.role, dto.account);
    return this.admin.roles();
  }

  @Post("roles/revoke")
  @HttpCode(HttpStatus.OK)
  revokeRole(@Headers("x-admin-subject") subject: string | undefined, @Body() dto: RoleChangeDto) {
    this.admin.revokeRole(requireHeader(subject, "x-admin-subject"), dto.role, dto.account);
    return this.admin.roles();
  }

  @Post("tranches/:tranche/reset")
  @HttpCode(HttpStatus.OK)
  async resetInsolventTranche(
    @Param("tranche") tranche: string,
    @Headers("x-admin-subject") subject: string | undefined,
  ) {
    const forfeited = await this.admin.resetInsolventTranche(
      requireHeader(subject, "x-admin-subject"),
      parseTrancheParam(tranche),
    );
    return { forfeitedShares: forfeited.toString() };
  }

  @Get("snapshot")
  snapshot(@Headers("x-admin-subject") subject: string | undefined) {
    const { json, stateHash, sequence } = this.admin.exportSnapshot(requireHeader(subject, "x-admin-subject"));
    const ledger: unknown = JSON.parse(json);
    return { sequence, stateHash, ledger };
  }

  @Get("keeper/check")
  async checkUpkeep(@Headers("x-admin-subject") subject: string | undefined) {
    return { items: await this.admin.checkUpkeep(requireHeader(subject, "x-admin-subject")) };
  }

  @Post("keeper/perform")
  @HttpCode(HttpStatus.OK)
  async performUpkeep(
    @Headers("x-admin-subject") subject: string | undefined,
    @Body() dto: PerformUpkeepDto,
  ) {
    return { outcomes: await this.admin.performUpkeep(requireHeader(subject, "x-admin-subject"), dto.items) };
  }
}
