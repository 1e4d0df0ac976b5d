import { expect } from "chai";
import { mkdtemp, rm, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import { ZodError } from "zod";
import { WalletSource } from "../agent/src/observer";

const W1 = "0x1111111111111111111111111111111111111111";
const W2 = "0xAbCdEf0123456789aBcDeF0123456789AbCdEf01";
const W3 = "0x3333333333333333333333333333333333333333";

describe("observer", () => {
  let dir: string;

  before(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "wallet-source-"));
  });

  after(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function listFile(name: string, contents: string) {
    const file = path.join(dir, name);
    await writeFile(file, contents);
    return file;
  }

  it("loads wallets in file order", async () => {
    const file = await listFile("wallets.json", JSON.stringify([W1, W2, W3]));
    expect(await new WalletSource(file).load()).to.deep.equal([W1, W2, W3]);
  });

  it("trims entries and drops invalid and duplicate addresses", async () => {
    const file = await listFile(
      "messy.json",
      JSON.stringify([` ${W1} `, "not-a-wallet", W2.toLowerCase(), W2, "0x1234", W3]),
    );

    expect(await new WalletSource(file).load()).to.deep.equal([
      W1,
      W2.toLowerCase(),
      W3,
    ]);
  });

  it("stops at the wallet limit", async () => {
    const file = await listFile("limited.json", JSON.stringify([W1, W2, W3]));
    expect(await new WalletSource(file, 2).load()).to.deep.equal([W1, W2]);
  });

  it("rejects a file that is not a list of strings", async () => {
    const file = await listFile("object.json", JSON.stringify({ wallets: [W1] }));
    try {
      await new WalletSource(file).load();
      expect.fail("Expected load to fail");
    } catch (err) {
      expect(err).to.be.instanceOf(ZodError);
    }
  });

  it("rejects a missing file", async () => {
    try {
      await new WalletSource(path.join(dir, "missing.json")).load();
      expect.fail("Expected load to fail");
    } catch (err) {
      expect(err).to.have.property("code", "ENOENT");
    }
  });
});
