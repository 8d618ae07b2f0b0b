import { mkdir, rm, stat, writeFile } from "node:fs/promises";
import path from "node:path";
import { ValidationError } from "@docboard/errors";

/**
 * Local directory shared by the request process and the workers. Deferred
 * uploads park their bytes here until the upload task moves them to storage.
 */
export class StagingArea {
  constructor(readonly dir: string) {}

  async stage(storageKey: string, content: Buffer): Promise<string> {
    if (path.basename(storageKey) !== storageKey) {
      throw new ValidationError("Storage key must be a plain file name", { storageKey });
    }
    await mkdir(this.dir, { recursive: true });
    const stagingPath = path.join(this.dir, storageKey);
    await writeFile(stagingPath, content);
    return stagingPath;
  }

  /** Size in bytes, or null when nothing is staged at that path. */
  async sizeOf(stagingPath: string): Promise<number | null> {
    try {
      const info = await stat(stagingPath);
      return info.isFile() ? info.size : null;
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") return null;
      throw err;
    }
  }

  async remove(stagingPath: string): Promise<void> {
    await rm(stagingPath, { force: true });
  }
}
