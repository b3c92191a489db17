import { ZeroAddress, getAddress, isAddress } from "ethers";
import { VaultException } from "../errors";

/** Checksummed form of a non-zero address, or InvalidAddress. */
export function normalizeAddress(value: string): string {
  if (!isAddress(value)) {
    throw new VaultException("InvalidAddress", `Invalid address: ${value}`);
  }
  const address = getAddress(value);
  if (address === ZeroAddress) {
    throw new VaultException("InvalidAddress", "Zero address not allowed");
  }
  return address;
}

/** Parses a comma-separated address list (env vars). Empty entries are dropped. */
export function parseAddressList(raw: string | undefined): string[] {
  return (raw ?? "")
    .split(",")
    .map((a) => a.trim())
    .filter(Boolean)
    .map(normalizeAddress);
}
