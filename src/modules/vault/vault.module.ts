import { Module } from "@nestjs/common";
import { AccessModule } from "../access";
import { LedgerModule } from "../ledger";
import { PricingModule } from "../pricing";
import { InMemoryAssetLedger, InMemoryCustody, InMemoryLendingPlatform } from "./adapters";
import { ASSET_TRANSFER, COLLATERAL_CUSTODY } from "./interfaces";
import { LoanLifecycleService } from "./loan-lifecycle.service";
import { NoteAdapterRegistry } from "./note-adapter.registry";
import { SimulationController } from "./simulation.controller";
import { VaultController } from "./vault.controller";
import { VaultService } from "./vault.service";

/**
 * The only collaborators wired here are the in-memory ones: deposit-asset
 * balances, note and collateral custody, and a simulated lending platform.
 * That makes this wiring development-only. Fund accounts and originate notes
 * through /admin/simulation. A deployment against real tokens binds its own
 * implementations to ASSET_TRANSFER and COLLATERAL_CUSTODY and registers its
 * note adapters with NoteAdapterRegistry.
 */
@Module({
  imports: [LedgerModule, PricingModule, AccessModule],
  providers: [
    InMemoryAssetLedger,
    InMemoryCustody,
    InMemoryLendingPlatform,
    { provide: ASSET_TRANSFER, useExisting: InMemoryAssetLedger },
    { provide: COLLATERAL_CUSTODY, useExisting: InMemoryCustody },
    NoteAdapterRegistry,
    VaultService,
    LoanLifecycleService,
  ],
  controllers: [VaultController, SimulationController],
  exports: [VaultService, LoanLifecycleService, NoteAdapterRegistry, InMemoryAssetLedger, InMemoryLendingPlatform],
})
export class VaultModule {}
