import { Body, Controller, HttpCode, HttpStatus, Logger, NotFoundException, Param, Post, UseGuards } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { ApiKeyGuard } from "../../common/guards/api-key.guard";
import { normalizeAddress } from "../../common/validation";
import { InMemoryAssetLedger, InMemoryCustody, InMemoryLendingPlatform } from "./adapters";
import { FaucetDto, OriginateSimulatedLoanDto } from "./dto";

/**
 * Drives the in-memory collaborators so the vault can be exercised over HTTP
 * in development. Every route answers 404 unless SIMULATION_NOTE_TOKEN is set.
 *
 * Routes:
 *   POST /admin/simulation/faucet                 - credit deposit asset to an account
 *   POST /admin/simulation/loans                  - originate a loan, note held by `lender`
 *   POST /admin/simulation/loans/:loanId/repay    - borrower repays; note holder is paid
 */
@UseGuards(ApiKeyGuard)
@Controller("admin/simulation")
export class SimulationController {
  private readonly logger = new Logger(SimulationController.name);
  private readonly noteToken?: string;

  constructor(
    config: ConfigService,
    private readonly assets: InMemoryAssetLedger,
    private readonly custody: InMemoryCustody,
    private readonly platform: InMemoryLendingPlatform,
  ) {
    const token = config.get<string>("SIMULATION_NOTE_TOKEN");
    this.noteToken = token ? normalizeAddress(token) : undefined;
  }

  @Post("faucet")
  @HttpCode(HttpStatus.OK)
  faucet(@Body() dto: FaucetDto) {
    this.requireEnabled();
    const account = normalizeAddress(dto.account);
    this.assets.credit(account, dto.amount);
    this.logger.log(`[simulation_faucet] account=${account} amount=${dto.amount}`);
    return { account, balance: this.assets.balanceOf(account).toString() };
  }

  @Post("loans")
  originate(@Body() dto: OriginateSimulatedLoanDto) {
    const noteToken = this.requireEnabled();
    const lender = normalizeAddress(dto.lender);
    const loanId = this.platform.originate({
      borrower: normalizeAddress(dto.borrower),
      principal: dto.principal,
      repayment: dto.repayment,
      duration: dto.durationSeconds,
      collateralToken: normalizeAddress(dto.collateralToken),
      collateralTokenId: dto.collateralTokenId,
    });
    this.custody.assign(noteToken, loanId, lender);
    return { noteToken, loanId, lender };
  }

  @Post("loans/:loanId/repay")
  @HttpCode(HttpStatus.OK)
  repay(@Param("loanId") loanId: string) {
    const noteToken = this.requireEnabled();
    this.platform.repay(loanId);
    return { noteToken, loanId, repaid: true };
  }

  private requireEnabled(): string {
    if (!this.noteToken) {
      throw new NotFoundException("Simulation is disabled: SIMULATION_NOTE_TOKEN is not set");
    }
    return this.noteToken;
  }
}
