import { formatEther } from "viem";
import { ExplorerTransaction } from "./etherscan";

export type FeatureRecord = Readonly<{
  walletId: string;
  txCount: number;
  totalValueEth: number;
  avgValueEth: number;
  failedTxs: number;
  recentActivityRatio: number; // share of txs in the last 30 days
  uniqueContracts: number;
}>;

export const RECENT_WINDOW_SECONDS = 30 * 24 * 60 * 60;

/** Keeps the transactions sent to or received from the comptroller. */
export function filterCompoundTransactions(
  transactions: readonly ExplorerTransaction[],
  comptroller: string,
): ExplorerTransaction[] {
  const target = comptroller.toLowerCase();
  return transactions.filter(
    (tx) => tx.to.toLowerCase() === target || tx.from.toLowerCase() === target,
  );
}

export function emptyFeatures(walletId: string): FeatureRecord {
  return {
    walletId,
    txCount: 0,
    totalValueEth: 0,
    avgValueEth: 0,
    failedTxs: 0,
    recentActivityRatio: 0,
    uniqueContracts: 0,
  };
}

export class FeatureExtractor {
  extract(
    walletId: string,
    transactions: readonly ExplorerTransaction[],
    now: number = Date.now() / 1000,
  ): FeatureRecord {
    if (transactions.length === 0) {
      return emptyFeatures(walletId);
    }

    // 1. Tx Count
    const txCount = transactions.length;

    // 2. Volume (wei -> ETH)
    const totalValueEth = transactions.reduce(
      (sum, tx) => sum + Number(formatEther(BigInt(tx.value))),
      0,
    );

    // 3. Failed Txs
    const failedTxs = transactions.filter((tx) => tx.isError === "1").length;

    // 4. Recent Activity
    const recentCount = transactions.filter(
      (tx) => now - Number(tx.timeStamp) < RECENT_WINDOW_SECONDS,
    ).length;
    const recentActivityRatio = recentCount / txCount;

    // 5. Counterparties (senders and recipients, including the wallet itself)
    const addresses = new Set<string>();
    for (const tx of transactions) {
      addresses.add(tx.to.toLowerCase());
      addresses.add(tx.from.toLowerCase());
    }

    return {
      walletId,
      txCount,
      totalValueEth,
      avgValueEth: totalValueEth / txCount,
      failedTxs,
      recentActivityRatio,
      uniqueContracts: addresses.size,
    };
  }
}
