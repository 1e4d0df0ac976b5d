import { readFile } from "fs/promises";
import path from "path";
import { z } from "zod";
import dotenv from "dotenv";
import { FeatureRecord } from "../agent/src/featureExtractor";
import { Scorer } from "../agent/src/scorer";
import { ResultWriter } from "../agent/src/writer";

dotenv.config();

// Range checks are left to the scorer so its errors name the wallet and field
const featureRecordSchema = z.object({
  walletId: z.string(),
  txCount: z.number(),
  totalValueEth: z.number(),
  avgValueEth: z.number(),
  failedTxs: z.number(),
  recentActivityRatio: z.number(),
  uniqueContracts: z.number(),
});

export async function loadFeatures(featuresPath: string): Promise<FeatureRecord[]> {
  const raw = await readFile(path.resolve(process.cwd(), featuresPath), "utf-8");
  return z.array(featureRecordSchema).parse(JSON.parse(raw));
}

async function main() {
  const featuresPath = process.argv[2] || process.env.FEATURES_PATH;
  const outputPath =
    process.argv[3] || process.env.OUTPUT_PATH || "wallet_risk_scores.csv";

  if (!featuresPath) {
    console.error("Usage: rescore <features.json> [output.csv]");
    process.exit(1);
  }

  const features = await loadFeatures(featuresPath);
  console.log(`Re-scoring ${features.length} wallets from ${featuresPath}`);

  const scores = new Scorer().scoreWallets(features);
  await new ResultWriter().writeScores(outputPath, scores);
}

if (require.main === module) {
  main().catch((err) => {
    console.error(err);
    process.exit(1);
  });
}
