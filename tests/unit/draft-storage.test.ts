import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  createDraftStorage,
  DraftStorage,
  LocalDraftStore,
  SupabaseDraftStore,
  type DraftBackend,
} from "../../src/adapters/storage/index.js";
import { getConfig } from "../../src/config/index.js";
import { PersistenceError } from "../../src/utils/errors.js";

const supabase = vi.hoisted(() => {
  const upload = vi.fn();
  const from = vi.fn(() => ({ upload }));
  const createClient = vi.fn(() => ({ storage: { from } }));
  return { upload, from, createClient };
});

vi.mock("@supabase/supabase-js", () => ({ createClient: supabase.createClient }));

class MemoryBackend implements DraftBackend {
  readonly writes: Array<{ content: string; locator: string; bucket: string | undefined }> = [];

  async write(content: string, locator: string, bucket?: string): Promise<void> {
    this.writes.push({ content, locator, bucket });
  }
}

describe("LocalDraftStore", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "drafts-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("creates the directory and writes the draft", async () => {
    const store = new LocalDraftStore(join(dir, "nested"));
    await store.write("Dear Alice", "draft_20240305_070809.txt");
    expect(await readFile(join(dir, "nested", "draft_20240305_070809.txt"), "utf8")).toBe("Dear Alice");
  });

  it("keeps writes inside the base directory", async () => {
    const store = new LocalDraftStore(dir);
    await store.write("x", "../../escape.txt");
    expect(await readFile(join(dir, "escape.txt"), "utf8")).toBe("x");
  });

  it("reports write failures as PersistenceError", async () => {
    const blocker = join(dir, "file");
    await new LocalDraftStore(dir).write("occupied", "file");
    const error = await new LocalDraftStore(blocker).write("x", "draft.txt").catch((e: unknown) => e);
    expect(error).toBeInstanceOf(PersistenceError);
    expect(error).toMatchObject({ target: "local" });
  });
});

describe("SupabaseDraftStore", () => {
  beforeEach(() => {
    supabase.upload.mockReset();
    supabase.from.mockClear();
    supabase.createClient.mockClear();
  });

  it("uploads plain text without overwriting", async () => {
    supabase.upload.mockResolvedValue({ data: { path: "draft.txt" }, error: null });
    const store = new SupabaseDraftStore({ url: "http://localhost:54321", serviceRoleKey: "test-secret" });

    await store.write("Dear Alice", "draft.txt", "reply-drafts");

    expect(supabase.createClient).toHaveBeenCalledWith("http://localhost:54321", "test-secret", {
      auth: { persistSession: false, autoRefreshToken: false },
    });
    expect(supabase.from).toHaveBeenCalledWith("reply-drafts");
    expect(supabase.upload).toHaveBeenCalledWith("draft.txt", "Dear Alice", { contentType: "text/plain", upsert: false });
  });

  it("requires a bucket", async () => {
    const store = new SupabaseDraftStore({ url: "http://localhost:54321", serviceRoleKey: "test-secret" });
    await expect(store.write("x", "draft.txt")).rejects.toThrow("No bucket configured for remote storage");
    expect(supabase.createClient).not.toHaveBeenCalled();
  });

  it("surfaces upload errors", async () => {
    supabase.upload.mockResolvedValue({ data: null, error: { message: "The resource already exists" } });
    const store = new SupabaseDraftStore({ url: "http://localhost:54321", serviceRoleKey: "test-secret" });

    await expect(store.write("x", "draft.txt", "reply-drafts")).rejects.toThrow(
      "Upload to bucket reply-drafts failed: The resource already exists"
    );
  });
});

describe("DraftStorage", () => {
  const originalEnv = { ...process.env };

  afterEach(() => {
    process.env = { ...originalEnv };
  });

  it("dispatches to the backend for the target", async () => {
    const local = new MemoryBackend();
    const remote = new MemoryBackend();
    const storage = new DraftStorage({ local, remote });

    await storage.store("A", "a.txt", "local");
    await storage.store("B", "b.txt", "remote", "reply-drafts");

    expect(local.writes).toEqual([{ content: "A", locator: "a.txt", bucket: undefined }]);
    expect(remote.writes).toEqual([{ content: "B", locator: "b.txt", bucket: "reply-drafts" }]);
  });

  it("fails for a target without a backend", async () => {
    const storage = new DraftStorage({ local: new MemoryBackend() });
    await expect(storage.store("B", "b.txt", "remote", "reply-drafts")).rejects.toThrow("remote storage is not configured");
  });

  it("registers remote storage only when Supabase is configured", async () => {
    delete process.env.SUPABASE_URL;
    delete process.env.SUPABASE_SERVICE_ROLE_KEY;
    const storage = createDraftStorage(getConfig());
    await expect(storage.store("x", "draft.txt", "remote", "reply-drafts")).rejects.toBeInstanceOf(PersistenceError);
    expect(supabase.upload).not.toHaveBeenCalled();
  });
});
