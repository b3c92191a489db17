import { Logger } from "@nestjs/common";
import { Clock } from "../../common/clock";
import { VaultLedgerState } from "./ledger.types";
import { cloneLedgerState } from "./vault-ledger";

export interface LedgerTransaction {
  /** Working copy. Discarded unless the whole transaction succeeds. */
  readonly draft: VaultLedgerState;
  /** Unix seconds, fixed for the duration of the transaction. */
  readonly now: number;
  /**
   * Queues an external side effect (transfer, custody move). Effects run in
   * order after the body returns and before commit. A failing effect
   * discards the draft and runs the `compensate` of every effect that had
   * already completed, newest first.
   */
  interact(label: string, effect: () => Promise<void>, compensate?: () => Promise<void>): void;
}

interface QueuedEffect {
  label: string;
  effect: () => Promise<void>;
  compensate?: () => Promise<void>;
}

export type CommitListener = (state: VaultLedgerState, sequence: number) => void;

/**
 * Single writer for the vault ledger.
 *
 * Every mutation runs against a clone of the last committed state while
 * holding a promise-chain mutex, so no two transactions interleave and no
 * reader sees a half-applied one. Order within a transaction is fixed:
 * body (reads external state, validates, mutates the draft), then queued
 * interactions, then commit.
 */
export class LedgerTransactionRunner {
  private readonly logger = new Logger(LedgerTransactionRunner.name);
  private committed: VaultLedgerState;
  private sequence = 0;
  private mutex: Promise<void> = Promise.resolve();
  private readonly listeners: CommitListener[] = [];

  constructor(
    initial: VaultLedgerState,
    private readonly clock: Clock,
  ) {
    this.committed = cloneLedgerState(initial);
  }

  async execute<T>(label: string, body: (tx: LedgerTransaction) => Promise<T> | T): Promise<T> {
    let unlock!: () => void;
    const prev = this.mutex;
    this.mutex = new Promise<void>((r) => {
      unlock = r;
    });

    try {
      await prev;

      const effects: QueuedEffect[] = [];
      const completed: QueuedEffect[] = [];
      const tx: LedgerTransaction = {
        draft: cloneLedgerState(this.committed),
        now: this.clock.now(),
        interact: (effectLabel, effect, compensate) => {
          effects.push({ label: effectLabel, effect, compensate });
        },
      };

      try {
        const result = await body(tx);
        for (const queued of effects) {
          this.logger.debug(`[ledger_interaction] tx=${label} effect=${queued.label}`);
          await queued.effect();
          completed.push(queued);
        }
        this.commit(tx.draft, label);
        return result;
      } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        this.logger.warn(`[ledger_rollback] tx=${label} reason=${reason}`);
        await this.compensate(label, completed);
        throw err;
      }
    } finally {
      unlock();
    }
  }

  /** Runs `fn` against the last committed state. `fn` must not mutate it. */
  read<T>(fn: (state: VaultLedgerState) => T): T {
    return fn(this.committed);
  }

  /** Replaces the committed state wholesale, e.g. when restoring a snapshot. */
  async restore(state: VaultLedgerState, sequence: number): Promise<void> {
    await this.execute("restore", (tx) => {
      this.sequence = sequence - 1;
      Object.assign(tx.draft, cloneLedgerState(state));
    });
  }

  onCommit(listener: CommitListener): void {
    this.listeners.push(listener);
  }

  get currentSequence(): number {
    return this.sequence;
  }

  private async compensate(label: string, completed: QueuedEffect[]): Promise<void> {
    for (const { label: effectLabel, compensate } of [...completed].reverse()) {
      if (!compensate) continue;
      try {
        await compensate();
        this.logger.debug(`[ledger_compensation] tx=${label} effect=${effectLabel}`);
      } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        this.logger.error(`[ledger_compensation_error] tx=${label} effect=${effectLabel} reason=${reason}`);
      }
    }
  }

  private commit(draft: VaultLedgerState, label: string): void {
    this.committed = draft;
    this.sequence += 1;
    this.logger.debug(`[ledger_commit] tx=${label} seq=${this.sequence}`);

    for (const listener of this.listeners) {
      try {
        listener(this.committed, this.sequence);
      } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        this.logger.error(`[ledger_listener_error] seq=${this.sequence} reason=${reason}`);
      }
    }
  }
}
