import { access, readFile } from "node:fs/promises";
import { extname } from "node:path";
import pdf from "pdf-parse/lib/pdf-parse.js";
import { ExtractionError } from "../../utils/errors.js";
import { log } from "../../utils/telemetry.js";
import type { ContentExtractor } from "./types.js";

/**
 * Reads PDFs through pdf-parse and everything else as UTF-8 text.
 */
export class FileContentExtractor implements ContentExtractor {
  async exists(path: string): Promise<boolean> {
    try {
      await access(path);
      return true;
    } catch {
      return false;
    }
  }

  async extractPlainText(path: string): Promise<string> {
    if (extname(path).toLowerCase() === ".pdf") {
      try {
        const data = await pdf(await readFile(path));
        log.debug({ pages: data.numpages, chars: data.text.length }, "Extracted PDF text");
        return data.text;
      } catch (error) {
        log.warn({ error }, "PDF extraction failed");
        throw new ExtractionError(`Could not read PDF file at ${path}`, path, error);
      }
    }

    try {
      return await readFile(path, "utf8");
    } catch (error) {
      log.warn({ error }, "File read failed");
      throw new ExtractionError(`Could not read file at ${path}`, path, error);
    }
  }
}
