import { afterAll, beforeAll, describe, expect, it } from "vitest";
import fs from "fs/promises";
import os from "os";
import path from "path";
import { readTokenFromStorage } from "../../auth/token-storage.js";
import { createLogger } from "../../logger.js";

const logger = createLogger({ enabled: false });
let dir = "";

async function writeStorage(name: string, content: unknown): Promise<string> {
  const file = path.join(dir, name);
  await fs.writeFile(file, typeof content === "string" ? content : JSON.stringify(content), "utf8");
  return file;
}

beforeAll(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), "token-storage-"));
});

afterAll(async () => {
  await fs.rm(dir, { recursive: true, force: true });
});

describe("readTokenFromStorage", () => {
  it("returns the token of the cloudide auth entry", async () => {
    const file = await writeStorage("storage.json", {
      "theme.preference": "dark",
      "iCubeAuthInfo://icube.cloudide": JSON.stringify({ token: "test-token", userId: "u-1" })
    });

    await expect(readTokenFromStorage(file, logger)).resolves.toBe("test-token");
  });

  it("returns null when no entry matches", async () => {
    const file = await writeStorage("no-auth.json", {
      "iCubeAuthInfo://icube.other": JSON.stringify({ token: "test-token" })
    });

    await expect(readTokenFromStorage(file, logger)).resolves.toBeNull();
  });

  it("returns null for a missing file or malformed content", async () => {
    const broken = await writeStorage("broken.json", "{not json");
    const badEntry = await writeStorage("bad-entry.json", { "iCubeAuthInfo://icube.cloudide": "{oops" });

    await expect(readTokenFromStorage(path.join(dir, "absent.json"), logger)).resolves.toBeNull();
    await expect(readTokenFromStorage(broken, logger)).resolves.toBeNull();
    await expect(readTokenFromStorage(badEntry, logger)).resolves.toBeNull();
  });
});
