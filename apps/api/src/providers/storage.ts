import { promises as fs } from "node:fs";
import path from "node:path";
import { z } from "zod";
import type { AppConfig } from "../config.js";

export interface StoredFile {
  key: string;
  size: number;
  contentType: string;
  url: string;
  uploadedAt: string;
}

export interface StorageProvider {
  readonly name: string;
  uploadFile(key: string, content: Buffer, contentType: string): Promise<StoredFile>;
  downloadFile(key: string): Promise<{ file: StoredFile; content: Buffer } | null>;
  deleteFile(key: string): Promise<boolean>;
  /** Files directly under the prefix, sorted by key. */
  listFiles(prefix: string): Promise<StoredFile[]>;
  getPublicUrl(key: string): string;
}

function publicUrl(baseUrl: string, key: string): string {
  return `${baseUrl.replace(/\/+$/, "")}/${key.split("/").map(encodeURIComponent).join("/")}`;
}

/** Segments may not be empty or start with a dot; dotted names are reserved for provider bookkeeping. */
function assertSafeKey(key: string): void {
  const segments = key.split("/");
  if (key.length === 0 || segments.some((segment) => segment === "" || segment.startsWith("."))) {
    throw new Error(`Invalid storage key: ${key}`);
  }
}

export class MemoryStorageProvider implements StorageProvider {
  readonly name = "memory";
  private readonly files = new Map<string, { file: StoredFile; content: Buffer }>();

  constructor(private readonly baseUrl: string) {}

  async uploadFile(key: string, content: Buffer, contentType: string): Promise<StoredFile> {
    assertSafeKey(key);
    const file: StoredFile = {
      key,
      size: content.length,
      contentType,
      url: this.getPublicUrl(key),
      uploadedAt: new Date().toISOString(),
    };
    this.files.set(key, { file, content: Buffer.from(content) });
    return { ...file };
  }

  async downloadFile(key: string): Promise<{ file: StoredFile; content: Buffer } | null> {
    const entry = this.files.get(key);
    return entry ? { file: { ...entry.file }, content: Buffer.from(entry.content) } : null;
  }

  async deleteFile(key: string): Promise<boolean> {
    return this.files.delete(key);
  }

  async listFiles(prefix: string): Promise<StoredFile[]> {
    return [...this.files.values()]
      .map((entry) => entry.file)
      .filter((file) => file.key.startsWith(prefix) && !file.key.slice(prefix.length).includes("/"))
      .sort((a, b) => a.key.localeCompare(b.key))
      .map((file) => ({ ...file }));
  }

  getPublicUrl(key: string): string {
    return publicUrl(this.baseUrl, key);
  }
}

const META_DIR = ".meta";

const metadataSchema = z.object({
  contentType: z.string(),
  uploadedAt: z.string(),
});

/** Stores each file under the root directory; its metadata lives at `.meta/<key>.json`. */
export class LocalStorageProvider implements StorageProvider {
  readonly name = "local";

  constructor(
    private readonly rootDir: string,
    private readonly baseUrl: string,
  ) {}

  private pathFor(key: string): string {
    assertSafeKey(key);
    return path.join(this.rootDir, ...key.split("/"));
  }

  private metaPathFor(key: string): string {
    assertSafeKey(key);
    return `${path.join(this.rootDir, META_DIR, ...key.split("/"))}.json`;
  }

  async uploadFile(key: string, content: Buffer, contentType: string): Promise<StoredFile> {
    const filePath = this.pathFor(key);
    const metaPath = this.metaPathFor(key);
    const uploadedAt = new Date().toISOString();
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.mkdir(path.dirname(metaPath), { recursive: true });
    await fs.writeFile(filePath, content);
    await fs.writeFile(metaPath, JSON.stringify({ contentType, uploadedAt }), "utf8");
    return { key, size: content.length, contentType, url: this.getPublicUrl(key), uploadedAt };
  }

  private async describe(key: string): Promise<StoredFile | null> {
    const filePath = this.pathFor(key);
    try {
      const [stat, meta] = await Promise.all([fs.stat(filePath), fs.readFile(this.metaPathFor(key), "utf8")]);
      const metadata = metadataSchema.parse(JSON.parse(meta));
      return { key, size: stat.size, contentType: metadata.contentType, url: this.getPublicUrl(key), uploadedAt: metadata.uploadedAt };
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      throw error;
    }
  }

  async downloadFile(key: string): Promise<{ file: StoredFile; content: Buffer } | null> {
    const file = await this.describe(key);
    if (!file) {
      return null;
    }
    return { file, content: await fs.readFile(this.pathFor(key)) };
  }

  async deleteFile(key: string): Promise<boolean> {
    const filePath = this.pathFor(key);
    try {
      await fs.unlink(filePath);
    } catch (error) {
      if (isMissingFile(error)) {
        return false;
      }
      throw error;
    }
    await fs.rm(this.metaPathFor(key), { force: true });
    return true;
  }

  async listFiles(prefix: string): Promise<StoredFile[]> {
    const directory = prefix.replace(/\/+$/, "");
    let names: string[];
    try {
      names = await fs.readdir(this.pathFor(directory));
    } catch (error) {
      if (isMissingFile(error)) {
        return [];
      }
      throw error;
    }

    const files: StoredFile[] = [];
    for (const name of names.filter((candidate) => !candidate.startsWith(".")).sort()) {
      const file = await this.describe(`${directory}/${name}`);
      if (file) {
        files.push(file);
      }
    }
    return files;
  }

  getPublicUrl(key: string): string {
    return publicUrl(this.baseUrl, key);
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export function createStorageProvider(storage: AppConfig["storage"]): StorageProvider {
  switch (storage.provider) {
    case "local":
      return new LocalStorageProvider(storage.localDir, storage.publicUrl);
    case "memory":
      return new MemoryStorageProvider(storage.publicUrl);
    default:
      throw new Error(`Unknown storage provider: ${String(storage.provider)}`);
  }
}
