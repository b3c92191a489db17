import { Injectable, Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { Cron } from "@nestjs/schedule";
import { KeeperService } from "./keeper.service";

/** Runs check + perform every minute when KEEPER_ENABLED is set. */
@Injectable()
export class KeeperScheduler {
  private readonly logger = new Logger(KeeperScheduler.name);
  private readonly enabled: boolean;
  private running = false;

  constructor(
    private readonly keeper: KeeperService,
    config: ConfigService,
  ) {
    this.enabled = config.get<boolean>("KEEPER_ENABLED", false);
  }

  @Cron("* * * * *", { name: "vault-keeper-upkeep", timeZone: "UTC" })
  async runUpkeep(): Promise<void> {
    if (!this.enabled || this.running) return;
    this.running = true;
    try {
      const items = await this.keeper.checkUpkeep();
      if (items.length === 0) {
        this.logger.debug("[keeper_schedule] nothing due");
        return;
      }
      const outcomes = await this.keeper.performUpkeep(items);
      const failed = outcomes.filter((o) => !o.ok).length;
      this.logger.log(`[keeper_schedule] performed=${outcomes.length - failed} failed=${failed}`);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      this.logger.error(`[keeper_schedule_error] upkeep failed: ${reason}`);
    } finally {
      this.running = false;
    }
  }
}
