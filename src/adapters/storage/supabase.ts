/**
 * Supabase Storage backend
 *
 * Uploads drafts as text/plain objects with the service-role key. The client
 * is created on first upload so the service starts without credentials.
 */

import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import { PersistenceError } from "../../utils/errors.js";
import { log } from "../../utils/telemetry.js";
import type { DraftBackend } from "./types.js";

export interface SupabaseStorageConfig {
  url: string;
  serviceRoleKey: string;
}

export class SupabaseDraftStore implements DraftBackend {
  private client: SupabaseClient | null = null;

  constructor(private readonly storageConfig: SupabaseStorageConfig) {}

  private getClient(): SupabaseClient {
    if (!this.client) {
      this.client = createClient(this.storageConfig.url, this.storageConfig.serviceRoleKey, {
        auth: { persistSession: false, autoRefreshToken: false },
      });
    }
    return this.client;
  }

  async write(content: string, locator: string, bucket?: string): Promise<void> {
    if (!bucket) {
      throw new PersistenceError("No bucket configured for remote storage", "remote");
    }

    const { error } = await this.getClient()
      .storage.from(bucket)
      .upload(locator, content, { contentType: "text/plain", upsert: false });

    if (error) {
      log.error({ bucket, locator, error: error.message }, "Supabase upload failed");
      throw new PersistenceError(`Upload to bucket ${bucket} failed: ${error.message}`, "remote", error);
    }

    log.info({ bucket, locator }, "Draft uploaded to remote storage");
  }
}
