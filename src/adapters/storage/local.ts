import { mkdir, writeFile } from "node:fs/promises";
import { basename, join, resolve } from "node:path";
import { PersistenceError } from "../../utils/errors.js";
import { log } from "../../utils/telemetry.js";
import type { DraftBackend } from "./types.js";

/**
 * Writes drafts as files under a base directory, created on first write.
 * Locators are reduced to their basename so a draft never lands outside it.
 */
export class LocalDraftStore implements DraftBackend {
  private readonly baseDir: string;

  constructor(baseDir: string) {
    this.baseDir = resolve(baseDir);
  }

  async write(content: string, locator: string): Promise<void> {
    const target = join(this.baseDir, basename(locator));
    try {
      await mkdir(this.baseDir, { recursive: true });
      await writeFile(target, content, "utf8");
    } catch (error) {
      throw new PersistenceError(
        `Could not write ${basename(locator)}: ${error instanceof Error ? error.message : String(error)}`,
        "local",
        error
      );
    }
    log.info({ locator: basename(locator), bytes: Buffer.byteLength(content) }, "Draft written to local storage");
  }
}
