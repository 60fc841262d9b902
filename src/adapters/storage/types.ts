export type SaveTarget = "local" | "remote";

/**
 * Persistence port used by the save step.
 */
export interface DraftStore {
  /** @throws PersistenceError */
  store(content: string, locator: string, target: SaveTarget, bucket?: string): Promise<void>;
}

/**
 * A single storage backend. `bucket` is only meaningful for remote backends.
 */
export interface DraftBackend {
  write(content: string, locator: string, bucket?: string): Promise<void>;
}
