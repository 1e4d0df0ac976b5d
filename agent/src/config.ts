import { isAddress } from "viem";
import { ConfigError } from "./errors";

// Compound V2 Comptroller on mainnet
export const DEFAULT_COMPTROLLER = "0x3d9819210A31b4961b30EF54bE2aeD79B9c9Cd3B";

export interface AgentConfig {
  etherscanApiKey: string;
  etherscanApiUrl: string;
  comptroller: string;
  walletsPath: string;
  outputPath: string;
  featuresPath?: string;
  maxWallets: number;
  requestDelayMs: number;
  requestTimeoutMs: number;
}

type Env = Record<string, string | undefined>;

function readInt(env: Env, name: string, fallback: number, min: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(`${name} must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

export function loadConfig(env: Env = process.env): AgentConfig {
  const etherscanApiKey = env.ETHERSCAN_API_KEY?.trim();
  if (!etherscanApiKey) {
    throw new ConfigError(
      "Etherscan API key not found. Set ETHERSCAN_API_KEY in the environment or .env file.",
    );
  }

  const comptroller = env.COMPOUND_COMPTROLLER || DEFAULT_COMPTROLLER;
  if (!isAddress(comptroller, { strict: false })) {
    throw new ConfigError(`COMPOUND_COMPTROLLER is not an address: ${comptroller}`);
  }

  return {
    etherscanApiKey,
    etherscanApiUrl: env.ETHERSCAN_API_URL || "https://api.etherscan.io/api",
    comptroller,
    walletsPath: env.WALLETS_PATH || "wallets.json",
    outputPath: env.OUTPUT_PATH || "wallet_risk_scores.csv",
    featuresPath: env.FEATURES_PATH || undefined,
    maxWallets: readInt(env, "MAX_WALLETS", 100, 1),
    requestDelayMs: readInt(env, "REQUEST_DELAY_MS", 200, 0), // ~5 req/sec
    requestTimeoutMs: readInt(env, "REQUEST_TIMEOUT_MS", 30000, 1),
  };
}
