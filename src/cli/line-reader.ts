export type ReadResult = { type: "line"; value: string } | { type: "eof" } | { type: "aborted" };

/**
 * Pull-based reader over an async line iterator (readline's).
 *
 * A read abandoned through its signal keeps its pending line, so the next
 * read receives it instead of losing it.
 */
export class LineReader {
  private pending: Promise<IteratorResult<string>> | null = null;

  constructor(private readonly lines: AsyncIterator<string>) {}

  async read(signal?: AbortSignal): Promise<ReadResult> {
    if (signal?.aborted) return { type: "aborted" };

    const next = this.pending ?? this.lines.next();
    this.pending = next;

    // Signals are created per read by the caller, so the once-listener never piles up.
    const aborted = new Promise<"aborted">((resolve) => {
      signal?.addEventListener("abort", () => resolve("aborted"), { once: true });
    });

    const winner = await Promise.race([next, aborted]);
    if (winner === "aborted") return { type: "aborted" };
    this.pending = null;
    return winner.done ? { type: "eof" } : { type: "line", value: winner.value };
  }
}
