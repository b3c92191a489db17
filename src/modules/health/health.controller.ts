import { Controller, Get } from "@nestjs/common";
import { LedgerService } from "../ledger";

@Controller("health")
export class HealthController {
  constructor(private readonly ledger: LedgerService) {}

  @Get()
  check() {
    const { paused, loans } = this.ledger.read((state) => ({
      paused: state.parameters.paused,
      loans: state.loans.size,
    }));

    return {
      status: "ok",
      timestamp: new Date().toISOString(),
      ledger: {
        sequence: this.ledger.sequence,
        paused,
        loans,
      },
    };
  }
}
