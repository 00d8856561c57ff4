import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";

// Where snapshots live. One opaque string per key.
export interface StorageAdapter {
  read(key: string): Promise<string | null>;
  write(key: string, data: string): Promise<void>;
  remove(key: string): Promise<void>;
}

export class MemoryStorage implements StorageAdapter {
  private readonly items = new Map<string, string>();

  async read(key: string): Promise<string | null> {
    return this.items.get(key) ?? null;
  }

  async write(key: string, data: string): Promise<void> {
    this.items.set(key, data);
  }

  async remove(key: string): Promise<void> {
    this.items.delete(key);
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

// Stores each key as `<dir>/<key>.json`. Writes go through a temp file and a rename.
export class FileStorage implements StorageAdapter {
  constructor(private readonly dir: string) {}

  private pathFor(key: string): string {
    if (!/^[\w.-]+$/.test(key)) throw new Error(`invalid storage key "${key}"`);
    return join(this.dir, `${key}.json`);
  }

  async read(key: string): Promise<string | null> {
    try {
      return await readFile(this.pathFor(key), "utf8");
    } catch (error) {
      if (isNotFound(error)) return null;
      throw error;
    }
  }

  async write(key: string, data: string): Promise<void> {
    const target = this.pathFor(key);
    const tmp = `${target}.tmp`;
    await mkdir(this.dir, { recursive: true });
    await writeFile(tmp, data, "utf8");
    await rename(tmp, target);
  }

  async remove(key: string): Promise<void> {
    await rm(this.pathFor(key), { force: true });
  }
}
