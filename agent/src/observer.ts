import { readFile } from "fs/promises";
import path from "path";
import { isAddress } from "viem";
import { z } from "zod";

const walletListSchema = z.array(z.string());

export class WalletSource {
  walletsPath: string;
  limit: number;

  constructor(walletsPath: string, limit: number = 100) {
    this.walletsPath = path.resolve(process.cwd(), walletsPath);
    this.limit = limit;
  }

  /**
   * Wallet addresses from the JSON list, in file order. Duplicates and
   * malformed addresses are dropped; at most `limit` are returned.
   */
  async load(): Promise<string[]> {
    const raw = await readFile(this.walletsPath, "utf-8");
    const entries = walletListSchema.parse(JSON.parse(raw));

    const seen = new Set<string>();
    const wallets: string[] = [];

    for (const entry of entries) {
      const wallet = entry.trim();
      if (!isAddress(wallet, { strict: false })) {
        console.warn(`[SOURCE] Skipping invalid wallet address: "${entry}"`);
        continue;
      }

      const key = wallet.toLowerCase();
      if (seen.has(key)) continue;
      seen.add(key);

      wallets.push(wallet);
      if (wallets.length >= this.limit) break;
    }

    return wallets;
  }
}
