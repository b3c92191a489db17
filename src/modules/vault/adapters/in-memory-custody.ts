import { Injectable, Logger } from "@nestjs/common";
import { CollateralCustody } from "../interfaces";

export const VAULT_HOLDER = "vault";

/** Ownership table for notes and collateral. Used in development and tests. */
@Injectable()
export class InMemoryCustody implements CollateralCustody {
  private readonly logger = new Logger(InMemoryCustody.name);
  private readonly owners = new Map<string, string>();

  ownerOf(token: string, id: string): string | undefined {
    return this.owners.get(this.key(token, id));
  }

  assign(token: string, id: string, owner: string): void {
    this.owners.set(this.key(token, id), owner.toLowerCase());
  }

  async receiveNote(noteToken: string, loanId: string, from: string): Promise<void> {
    const owner = this.ownerOf(noteToken, loanId);
    if (owner !== undefined && owner !== from.toLowerCase()) {
      throw new Error(`Note ${loanId} of ${noteToken} is not held by ${from}`);
    }
    this.owners.set(this.key(noteToken, loanId), VAULT_HOLDER);
    this.logger.debug(`[custody_note_in] note=${noteToken} loan=${loanId} from=${from}`);
  }

  async returnNote(noteToken: string, loanId: string, to: string): Promise<void> {
    this.owners.set(this.key(noteToken, loanId), to.toLowerCase());
    this.logger.debug(`[custody_note_out] note=${noteToken} loan=${loanId} to=${to}`);
  }

  async releaseCollateral(collateralToken: string, tokenId: string, to: string): Promise<void> {
    this.owners.set(this.key(collateralToken, tokenId), to.toLowerCase());
    this.logger.debug(`[custody_collateral_out] token=${collateralToken} id=${tokenId} to=${to}`);
  }

  private key(token: string, id: string): string {
    return `${token.toLowerCase()}:${id}`;
  }
}
