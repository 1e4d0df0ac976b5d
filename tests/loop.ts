import { expect } from "chai";
import { runOnce, AgentDeps } from "../agent/src/loop";
import { AgentConfig, DEFAULT_COMPTROLLER } from "../agent/src/config";
import { ExplorerTransaction } from "../agent/src/etherscan";
import { FeatureExtractor, FeatureRecord } from "../agent/src/featureExtractor";
import { Scorer, WalletScore } from "../agent/src/scorer";

const W1 = "0x1111111111111111111111111111111111111111";
const W2 = "0x2222222222222222222222222222222222222222";
const W3 = "0x3333333333333333333333333333333333333333";

const config: AgentConfig = {
  etherscanApiKey: "test-secret",
  etherscanApiUrl: "https://explorer.test/api",
  comptroller: DEFAULT_COMPTROLLER,
  walletsPath: "wallets.json",
  outputPath: "scores.csv",
  maxWallets: 100,
  requestDelayMs: 200,
  requestTimeoutMs: 1000,
};

const histories: Record<string, ExplorerTransaction[]> = {
  [W1]: [
    {
      hash: "0x01",
      from: W1,
      to: DEFAULT_COMPTROLLER,
      value: "1000000000000000000",
      timeStamp: "0",
      isError: "0",
    },
    {
      hash: "0x02",
      from: W1,
      to: W3,
      value: "9000000000000000000",
      timeStamp: "0",
      isError: "1",
    },
  ],
  [W3]: [],
};

function fakeDeps(wallets: string[]) {
  const sleeps: number[] = [];
  const written: { scores?: WalletScore[]; features?: FeatureRecord[] } = {};

  const deps: AgentDeps = {
    source: { load: async () => wallets },
    client: {
      fetchTransactions: async (wallet: string) => {
        const history = histories[wallet];
        if (!history) throw new Error(`unexpected wallet ${wallet}`);
        return history;
      },
    },
    featureExtractor: new FeatureExtractor(),
    scorer: new Scorer(),
    writer: {
      writeScores: async (_path: string, scores: readonly WalletScore[]) => {
        written.scores = [...scores];
      },
      writeFeatures: async (_path: string, features: readonly FeatureRecord[]) => {
        written.features = [...features];
      },
    },
    sleep: async (ms: number) => {
      sleeps.push(ms);
    },
  };

  return { deps, sleeps, written };
}

describe("loop", () => {
  it("scores every wallet and writes the results", async () => {
    const { deps, sleeps, written } = fakeDeps([W1, W2, W3]);

    const scores = await runOnce(config, deps);

    // W2 fails to fetch and falls back to empty features
    expect(scores).to.deep.equal([
      { walletId: W1, score: 350 },
      { walletId: W2, score: 300 },
      { walletId: W3, score: 300 },
    ]);
    expect(written.scores).to.deep.equal(scores);
    expect(written.features).to.equal(undefined);
    expect(sleeps).to.deep.equal([200, 200, 200]);
  });

  it("saves the features when a features path is set", async () => {
    const { deps, written } = fakeDeps([W1, W3]);

    await runOnce({ ...config, featuresPath: "features.json" }, deps);

    expect(written.features).to.deep.equal([
      {
        walletId: W1,
        txCount: 1,
        totalValueEth: 1,
        avgValueEth: 1,
        failedTxs: 0,
        recentActivityRatio: 0,
        uniqueContracts: 2,
      },
      {
        walletId: W3,
        txCount: 0,
        totalValueEth: 0,
        avgValueEth: 0,
        failedTxs: 0,
        recentActivityRatio: 0,
        uniqueContracts: 0,
      },
    ]);
  });

  it("writes nothing for an empty wallet list", async () => {
    const { deps, sleeps, written } = fakeDeps([]);

    expect(await runOnce(config, deps)).to.deep.equal([]);
    expect(written.scores).to.equal(undefined);
    expect(sleeps).to.deep.equal([]);
  });
});
