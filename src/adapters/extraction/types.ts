/**
 * Content extraction port: turns a file on disk into plain text.
 */
export interface ContentExtractor {
  exists(path: string): Promise<boolean>;
  /** @throws ExtractionError when the file is unreadable or not the expected format */
  extractPlainText(path: string): Promise<string>;
}
