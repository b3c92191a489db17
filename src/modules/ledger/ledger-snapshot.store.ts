import { Injectable, Logger, OnModuleInit } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import * as fs from "fs";
import * as path from "path";
import { LedgerService } from "./ledger.service";
import { deserializeLedger, serializeLedger } from "./ledger-snapshot";

/**
 * Optional file persistence. With LEDGER_SNAPSHOT_PATH set, the ledger is
 * restored from that file at boot and rewritten after every commit.
 */
@Injectable()
export class LedgerSnapshotStore implements OnModuleInit {
  private readonly logger = new Logger(LedgerSnapshotStore.name);

  constructor(
    private readonly config: ConfigService,
    private readonly ledger: LedgerService,
  ) {}

  async onModuleInit(): Promise<void> {
    const file = this.config.get<string>("LEDGER_SNAPSHOT_PATH");
    if (!file) return;

    if (fs.existsSync(file)) {
      const { state, sequence } = deserializeLedger(fs.readFileSync(file, "utf8"));
      await this.ledger.restore(state, sequence);
      this.logger.log(`[snapshot_restore] path=${file} seq=${sequence} loans=${state.loans.size}`);
    }

    this.ledger.onCommit((state, sequence) => {
      const { json, stateHash } = serializeLedger(state, sequence);
      fs.mkdirSync(path.dirname(file), { recursive: true });
      const tmp = `${file}.tmp`;
      fs.writeFileSync(tmp, json, "utf8");
      fs.renameSync(tmp, file);
      this.logger.debug(`[snapshot_write] seq=${sequence} hash=${stateHash}`);
    });
  }
}
