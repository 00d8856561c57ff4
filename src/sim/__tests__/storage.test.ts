import { mkdtemp, readdir, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { FileStorage, MemoryStorage } from "../storage";

describe("MemoryStorage", () => {
  it("reads back what was written and forgets removed keys", async () => {
    const storage = new MemoryStorage();
    expect(await storage.read("slot")).toBeNull();

    await storage.write("slot", "one");
    await storage.write("slot", "two");
    expect(await storage.read("slot")).toBe("two");

    await storage.remove("slot");
    expect(await storage.read("slot")).toBeNull();
  });
});

describe("FileStorage", () => {
  let dir = "";

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "kitchen-garden-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("stores each key as a JSON file and leaves no temp file behind", async () => {
    const storage = new FileStorage(join(dir, "saves"));
    expect(await storage.read("progress")).toBeNull();

    await storage.write("progress", '{"coins":1}');
    await storage.write("progress", '{"coins":2}');

    expect(await storage.read("progress")).toBe('{"coins":2}');
    expect(await readdir(join(dir, "saves"))).toEqual(["progress.json"]);
  });

  it("removes keys, including ones that were never written", async () => {
    const storage = new FileStorage(dir);
    await storage.write("progress", "{}");

    await storage.remove("progress");
    await storage.remove("missing");
    expect(await storage.read("progress")).toBeNull();
  });

  it("rejects keys that would escape the directory", async () => {
    const storage = new FileStorage(dir);
    await expect(storage.write("../outside", "{}")).rejects.toThrow('invalid storage key "../outside"');
  });
});
