import type { Config } from "../../config/index.js";
import { PersistenceError } from "../../utils/errors.js";
import { LocalDraftStore } from "./local.js";
import { SupabaseDraftStore } from "./supabase.js";
import type { DraftBackend, DraftStore, SaveTarget } from "./types.js";

export type { DraftBackend, DraftStore, SaveTarget } from "./types.js";
export { LocalDraftStore } from "./local.js";
export { SupabaseDraftStore } from "./supabase.js";

/**
 * Dispatches a save to the backend registered for its target.
 */
export class DraftStorage implements DraftStore {
  constructor(private readonly backends: Partial<Record<SaveTarget, DraftBackend>>) {}

  async store(content: string, locator: string, target: SaveTarget, bucket?: string): Promise<void> {
    const backend = this.backends[target];
    if (!backend) {
      throw new PersistenceError(`${target} storage is not configured`, target);
    }
    await backend.write(content, locator, bucket);
  }
}

export function createDraftStorage(config: Config): DraftStorage {
  const { localDir, supabaseUrl, supabaseServiceRoleKey } = config.storage;
  return new DraftStorage({
    local: new LocalDraftStore(localDir),
    remote:
      supabaseUrl && supabaseServiceRoleKey
        ? new SupabaseDraftStore({ url: supabaseUrl, serviceRoleKey: supabaseServiceRoleKey })
        : undefined,
  });
}
