/**
 * Input detection for ParseInput.
 *
 * | Input                         | Candidate path      | Explicit |
 * |-------------------------------|---------------------|----------|
 * | `load ./mail.pdf`             | `./mail.pdf`        | yes      |
 * | `LOAD "notes.txt"`            | `notes.txt`         | yes      |
 * | `./mail.pdf`                  | `./mail.pdf`        | no       |
 * | `Hi Bob, see you at 5.`       | (whole text)        | no       |
 */

const LOAD_COMMAND = /^load\s+(.+)$/is;

export interface InputCandidate {
  candidate: string;
  explicit: boolean;
}

function stripQuotes(value: string): string {
  const trimmed = value.trim();
  const match = /^(["'])(.*)\1$/s.exec(trimmed);
  return match?.[2]?.trim() ?? trimmed;
}

export function parseLoadCommand(text: string): InputCandidate {
  const match = LOAD_COMMAND.exec(text.trim());
  const argument = match?.[1];
  if (argument !== undefined) {
    return { candidate: stripQuotes(argument), explicit: true };
  }
  return { candidate: text.trim(), explicit: false };
}

/**
 * A path-like token: contains a period and no whitespace.
 */
export function isLikelyFilePath(text: string): boolean {
  return text.includes(".") && !/\s/.test(text);
}

export function isPdfPath(path: string): boolean {
  return path.toLowerCase().endsWith(".pdf");
}
