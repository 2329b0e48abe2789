import { randomUUID } from "node:crypto";
import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import type { z } from "zod";

/**
 * JSON snapshot persisted atomically: every save writes a uniquely named
 * temporary file next to the target and renames it into place, so readers
 * never observe a half-written document. Loads are validated against a zod
 * schema so a hand-edited or truncated file fails loudly at start-up.
 */
export class JsonSnapshotFile<T> {
  private saveQueue: Promise<void> = Promise.resolve();

  constructor(
    readonly filePath: string,
    private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ) {}

  /** Returns the stored document, or `null` when the file does not exist yet. */
  async load(): Promise<T | null> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf8");
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        return null;
      }
      throw error;
    }
    return this.schema.parse(JSON.parse(raw));
  }

  /**
   * Persists the document. Saves are chained so a slow write can never land
   * after a later one.
   */
  save(document: T): Promise<void> {
    const serialised = JSON.stringify(document, null, 2);
    const next = this.saveQueue.then(() => this.write(serialised));
    // Keep the chain alive after a failure; the caller still sees the rejection.
    this.saveQueue = next.catch(() => undefined);
    return next;
  }

  private async write(serialised: string): Promise<void> {
    const tmpPath = `${this.filePath}.${randomUUID()}.tmp`;
    await mkdir(dirname(this.filePath), { recursive: true });
    try {
      await writeFile(tmpPath, serialised, "utf8");
      await rename(tmpPath, this.filePath);
    } catch (error) {
      await rm(tmpPath, { force: true });
      throw error;
    }
  }
}
