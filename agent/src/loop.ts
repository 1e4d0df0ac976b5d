import { WalletSource } from "./observer";
import { EtherscanClient } from "./etherscan";
import {
  FeatureExtractor,
  FeatureRecord,
  emptyFeatures,
  filterCompoundTransactions,
} from "./featureExtractor";
import { Scorer, WalletScore } from "./scorer";
import { ResultWriter } from "./writer";
import { AgentConfig, loadConfig } from "./config";
import dotenv from "dotenv";

export interface AgentDeps {
  source: Pick<WalletSource, "load">;
  client: Pick<EtherscanClient, "fetchTransactions">;
  featureExtractor: FeatureExtractor;
  scorer: Scorer;
  writer: Pick<ResultWriter, "writeScores" | "writeFeatures">;
  sleep: (ms: number) => Promise<void>;
}

const sleep = (ms: number) =>
  new Promise<void>((resolve) => setTimeout(resolve, ms));

export function createAgent(config: AgentConfig): AgentDeps {
  return {
    source: new WalletSource(config.walletsPath, config.maxWallets),
    client: new EtherscanClient(config),
    featureExtractor: new FeatureExtractor(),
    scorer: new Scorer(),
    writer: new ResultWriter(),
    sleep,
  };
}

export async function runOnce(
  config: AgentConfig,
  deps: AgentDeps,
): Promise<WalletScore[]> {
  console.log(`[AGENT] Starting run at ${new Date().toISOString()}`);

  // 1. Observe
  const wallets = await deps.source.load();
  console.log(`[AGENT] Loaded ${wallets.length} wallets`);

  if (wallets.length === 0) {
    console.log(`[AGENT] Nothing to score.`);
    return [];
  }

  // 2. Extract Features
  const features: FeatureRecord[] = [];
  for (const [i, wallet] of wallets.entries()) {
    console.log(
      `[AGENT] Processing wallet ${i + 1}/${wallets.length}: ${wallet}`,
    );
    try {
      const transactions = await deps.client.fetchTransactions(wallet);
      const compoundTxs = filterCompoundTransactions(
        transactions,
        config.comptroller,
      );
      features.push(deps.featureExtractor.extract(wallet, compoundTxs));
    } catch (err) {
      console.error(`[AGENT] Error processing wallet ${wallet}:`, err);
      features.push(emptyFeatures(wallet));
    }
    // Respect Etherscan rate limits
    await deps.sleep(config.requestDelayMs);
  }

  // 3. Score
  const scores = deps.scorer.scoreWallets(features);

  // 4. Write
  if (config.featuresPath) {
    await deps.writer.writeFeatures(config.featuresPath, features);
  }
  await deps.writer.writeScores(config.outputPath, scores);

  console.log(`[AGENT] Run complete.`);
  return scores;
}

async function main() {
  dotenv.config();
  const config = loadConfig();
  await runOnce(config, createAgent(config));
}

if (require.main === module) {
  main().catch((err) => {
    console.error(err);
    process.exit(1);
  });
}
