import axios, { AxiosInstance } from "axios";
import { z } from "zod";
import { AgentConfig } from "./config";

const weiSchema = z.string().regex(/^\d+$/, "value must be a wei amount");

export const explorerTransactionSchema = z
  .object({
    hash: z.string(),
    from: z.string(),
    to: z.string().default(""), // empty on contract creation
    value: weiSchema,
    timeStamp: z.string().regex(/^\d+$/, "timeStamp must be unix seconds"),
    isError: z.enum(["0", "1"]).default("0"),
  })
  .passthrough();

export type ExplorerTransaction = z.infer<typeof explorerTransactionSchema>;

const txListResponseSchema = z.object({
  status: z.string(),
  message: z.string().optional(),
  result: z.unknown(),
});

export type EtherscanClientOptions = Pick<
  AgentConfig,
  "etherscanApiKey" | "etherscanApiUrl" | "requestTimeoutMs"
>;

export class EtherscanClient {
  private http: AxiosInstance;

  constructor(
    private options: EtherscanClientOptions,
    http?: AxiosInstance,
  ) {
    this.http =
      http ?? axios.create({ headers: { Accept: "application/json" } });
  }

  /**
   * Full normal-transaction history of a wallet, oldest first. Failed
   * requests and empty histories both come back as an empty list.
   */
  async fetchTransactions(walletAddress: string): Promise<ExplorerTransaction[]> {
    try {
      const response = await this.http.get(this.options.etherscanApiUrl, {
        timeout: this.options.requestTimeoutMs,
        params: {
          module: "account",
          action: "txlist",
          address: walletAddress,
          startblock: 0,
          endblock: 99999999,
          sort: "asc",
          apikey: this.options.etherscanApiKey,
        },
      });

      const body = txListResponseSchema.parse(response.data);
      if (body.status !== "1" || !Array.isArray(body.result)) {
        if (body.message === "No transactions found") {
          console.log(`[ETHERSCAN] No transactions found for ${walletAddress}`);
        } else {
          // e.g. NOTOK with "Invalid API Key" or "Max rate limit reached"
          const detail = [body.message, typeof body.result === "string" ? body.result : undefined]
            .filter(Boolean)
            .join(": ");
          console.warn(
            `[ETHERSCAN] Explorer returned no transactions for ${walletAddress}: ${detail || `status ${body.status}`}`,
          );
        }
        return [];
      }

      const transactions: ExplorerTransaction[] = [];
      for (const entry of body.result) {
        const parsed = explorerTransactionSchema.safeParse(entry);
        if (parsed.success) {
          transactions.push(parsed.data);
        } else {
          console.warn(
            `[ETHERSCAN] Skipping malformed transaction for ${walletAddress}: ${parsed.error.issues[0]?.message}`,
          );
        }
      }
      return transactions;
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      console.error(
        `[ETHERSCAN] Error fetching transactions for ${walletAddress}: ${reason}`,
      );
      return [];
    }
  }
}
