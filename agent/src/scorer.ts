import { FeatureRecord } from "./featureExtractor";
import { EmptyBatchError, InvalidInputError } from "./errors";

export const MAX_SCORE = 1000;

// Bot / high-risk detection
export const OVERRIDE_LIMITS = {
  txCount: 500,
  failedTxs: 10,
};

export const WEIGHTS = {
  invTxCount: 0.2, // high tx count = higher risk
  totalValueEth: 0.3, // higher volume = lower risk
  invAvgValueEth: 0.1, // high avg value = higher risk
  invFailedTxs: 0.3, // more failed txs = higher risk
  recentActivityRatio: 0.05, // recent activity = lower risk
  uniqueContracts: 0.05, // more contracts = lower risk
} as const;

type ScoreFeature = keyof typeof WEIGHTS;
type ScoreVector = Record<ScoreFeature, number>;

const SCORE_FEATURES: readonly ScoreFeature[] = [
  "invTxCount",
  "totalValueEth",
  "invAvgValueEth",
  "invFailedTxs",
  "recentActivityRatio",
  "uniqueContracts",
];

export interface WalletScore {
  walletId: string;
  score: number;
}

function validate(record: FeatureRecord, index: number) {
  const fail = (field: string, reason: string) =>
    new InvalidInputError(index, record.walletId, field, reason);

  const counts = ["txCount", "failedTxs", "uniqueContracts"] as const;
  const reals = ["totalValueEth", "avgValueEth", "recentActivityRatio"] as const;

  for (const field of counts) {
    const value = record[field];
    if (!Number.isInteger(value)) throw fail(field, `must be an integer, got ${value}`);
    if (value < 0) throw fail(field, `must be non-negative, got ${value}`);
  }
  for (const field of reals) {
    const value = record[field];
    if (!Number.isFinite(value)) throw fail(field, `must be finite, got ${value}`);
    if (value < 0) throw fail(field, `must be non-negative, got ${value}`);
  }
  if (record.recentActivityRatio > 1) {
    throw fail("recentActivityRatio", `must be within [0, 1], got ${record.recentActivityRatio}`);
  }
  if (record.failedTxs > record.txCount) {
    throw fail("failedTxs", `(${record.failedTxs}) exceeds txCount (${record.txCount})`);
  }
}

export function isHighRisk(record: FeatureRecord): boolean {
  return (
    record.txCount > OVERRIDE_LIMITS.txCount ||
    record.failedTxs > OVERRIDE_LIMITS.failedTxs
  );
}

function toScoreVector(record: FeatureRecord): ScoreVector {
  return {
    invTxCount: 1 / (record.txCount + 1),
    totalValueEth: record.totalValueEth,
    invAvgValueEth: 1 / (record.avgValueEth + 1),
    invFailedTxs: 1 / (record.failedTxs + 1),
    recentActivityRatio: record.recentActivityRatio,
    uniqueContracts: record.uniqueContracts,
  };
}

/**
 * Min-max scales every feature column to [0, 1] in place. A column with no
 * spread scales to 0.
 */
function normalize(vectors: ScoreVector[]) {
  for (const feature of SCORE_FEATURES) {
    let min = Infinity;
    let max = -Infinity;
    for (const v of vectors) {
      if (v[feature] < min) min = v[feature];
      if (v[feature] > max) max = v[feature];
    }
    const range = max - min;

    for (const v of vectors) {
      v[feature] = range > 0 ? (v[feature] - min) / range : 0;
    }
  }
}

/** Rounds to the nearest integer, ties to even. */
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const diff = value - floor;
  if (diff > 0.5) return floor + 1;
  if (diff < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}

export class Scorer {
  /**
   * Scores a batch of wallets (0 = high risk, 1000 = low risk).
   *
   * Scores are relative to the batch: every feature is min-max scaled against
   * the other non-overridden records, so the same wallet can score differently
   * in a different batch. Wallets over the transaction or failure limits score
   * 0 and are left out of the scaling.
   */
  scoreBatch(records: readonly FeatureRecord[]): number[] {
    if (records.length === 0) throw new EmptyBatchError();
    records.forEach(validate);

    const scores = records.map(() => 0);
    const active: number[] = [];
    const vectors: ScoreVector[] = [];

    records.forEach((record, i) => {
      if (isHighRisk(record)) return;
      active.push(i);
      vectors.push(toScoreVector(record));
    });

    if (vectors.length === 0) return scores;
    normalize(vectors);

    vectors.forEach((v, j) => {
      const weighted = SCORE_FEATURES.reduce(
        (sum, feature) => sum + v[feature] * WEIGHTS[feature],
        0,
      );
      const score = roundHalfEven(weighted * MAX_SCORE);
      scores[active[j]] = Math.max(0, Math.min(MAX_SCORE, score));
    });

    return scores;
  }

  scoreWallets(records: readonly FeatureRecord[]): WalletScore[] {
    const scores = this.scoreBatch(records);
    return records.map((record, i) => ({
      walletId: record.walletId,
      score: scores[i],
    }));
  }
}
