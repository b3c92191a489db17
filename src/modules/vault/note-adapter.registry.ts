import { Injectable, Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { VaultException } from "../../common/errors";
import { normalizeAddress } from "../../common/validation";
import { InMemoryLendingPlatform } from "./adapters";
import { NoteAdapter } from "./interfaces";

/** Note-token address → receivable adapter. */
@Injectable()
export class NoteAdapterRegistry {
  private readonly logger = new Logger(NoteAdapterRegistry.name);
  private readonly adapters = new Map<string, NoteAdapter>();

  constructor(config: ConfigService, simulation: InMemoryLendingPlatform) {
    const simulationToken = config.get<string>("SIMULATION_NOTE_TOKEN");
    if (simulationToken) {
      this.register(simulationToken, simulation);
    }
  }

  register(noteToken: string, adapter: NoteAdapter): void {
    const token = normalizeAddress(noteToken);
    this.adapters.set(token, adapter);
    this.logger.log(`[note_adapter] token=${token} adapter=${adapter.name}`);
  }

  unregister(noteToken: string): void {
    this.adapters.delete(normalizeAddress(noteToken));
  }

  get(noteToken: string): NoteAdapter {
    const adapter = this.adapters.get(normalizeAddress(noteToken));
    if (!adapter) {
      throw new VaultException("UnsupportedNoteToken", `No adapter for note token ${noteToken}`);
    }
    return adapter;
  }

  tokens(): string[] {
    return [...this.adapters.keys()];
  }
}
