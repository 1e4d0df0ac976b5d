import { mkdir, writeFile } from "fs/promises";
import path from "path";
import { stringify } from "csv-stringify/sync";
import { FeatureRecord } from "./featureExtractor";
import { WalletScore } from "./scorer";

export function toCsv(scores: readonly WalletScore[]): string {
  return stringify(
    scores.map((s) => ({ wallet_id: s.walletId, score: s.score })),
    { header: true, columns: ["wallet_id", "score"] },
  );
}

export class ResultWriter {
  async writeScores(outputPath: string, scores: readonly WalletScore[]) {
    const resolved = await this.prepare(outputPath);
    await writeFile(resolved, toCsv(scores));
    console.log(`[WRITER] Wallet risk scores saved to ${resolved}`);
  }

  async writeFeatures(outputPath: string, features: readonly FeatureRecord[]) {
    const resolved = await this.prepare(outputPath);
    await writeFile(resolved, JSON.stringify(features, null, 2));
    console.log(`[WRITER] Wallet features saved to ${resolved}`);
  }

  private async prepare(outputPath: string): Promise<string> {
    const resolved = path.resolve(process.cwd(), outputPath);
    await mkdir(path.dirname(resolved), { recursive: true });
    return resolved;
  }
}
