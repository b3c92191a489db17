import { Inject, Injectable, Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { CLOCK, Clock } from "../../common/clock";
import { normalizeRate, parseFixed } from "../../common/fixed-point";
import { VaultLedgerState, VaultParameters } from "./ledger.types";
import { CommitListener, LedgerTransaction, LedgerTransactionRunner } from "./ledger-transaction-runner";
import { EncodedSnapshot, serializeLedger } from "./ledger-snapshot";
import { createLedgerState } from "./vault-ledger";

export function vaultParametersFromConfig(config: ConfigService): VaultParameters {
  return {
    seniorTrancheRate: normalizeRate(parseFixed(config.get<string>("VAULT_SENIOR_TRANCHE_RATE", "0.05"))),
    reserveRatio: parseFixed(config.get<string>("VAULT_RESERVE_RATIO", "0.10")),
    paused: false,
    timeBucketWidth: config.get<number>("VAULT_TIME_BUCKET_SECONDS", 7 * 86_400),
    prorationBuckets: config.get<number>("VAULT_PRORATION_BUCKETS", 6),
  };
}

/** Nest-facing handle on the single ledger instance. */
@Injectable()
export class LedgerService {
  private readonly logger = new Logger(LedgerService.name);
  private readonly runner: LedgerTransactionRunner;

  constructor(
    config: ConfigService,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {
    const parameters = vaultParametersFromConfig(config);
    this.runner = new LedgerTransactionRunner(createLedgerState(parameters), clock);
    this.logger.log(
      `[ledger_init] seniorRate=${parameters.seniorTrancheRate}/s reserveRatio=${parameters.reserveRatio} bucket=${parameters.timeBucketWidth}s horizon=${parameters.prorationBuckets}`,
    );
  }

  execute<T>(label: string, body: (tx: LedgerTransaction) => Promise<T> | T): Promise<T> {
    return this.runner.execute(label, body);
  }

  read<T>(fn: (state: VaultLedgerState) => T): T {
    return this.runner.read(fn);
  }

  now(): number {
    return this.clock.now();
  }

  get sequence(): number {
    return this.runner.currentSequence;
  }

  snapshot(): EncodedSnapshot {
    return this.runner.read((state) => serializeLedger(state, this.runner.currentSequence));
  }

  restore(state: VaultLedgerState, sequence: number): Promise<void> {
    return this.runner.restore(state, sequence);
  }

  onCommit(listener: CommitListener): void {
    this.runner.onCommit(listener);
  }
}
