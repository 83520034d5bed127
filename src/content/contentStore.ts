import crypto from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import { NotFoundError, StoreCorruptionError } from "../errors";
import type { Logger, MetricsRegistry } from "../observability";
import type { PipelineStore } from "../store";
import type { FileAsset } from "../types";
import { sanitizeFilename } from "./filenames";

export interface ContentStoreDeps {
  store: PipelineStore;
  rootDir: string;
  logger: Logger;
  metrics: MetricsRegistry;
  clock?: () => Date;
}

export interface PutMetadata {
  filename: string;
  sourceUrl?: string;
}

export interface PutResult {
  fileHash: string;
  created: boolean;
  asset: FileAsset;
}

export interface StoredContent {
  asset: FileAsset;
  bytes: Buffer;
}

export interface IntegrityReport {
  checked: number;
  missing: FileAsset[];
}

export function hashContent(bytes: Uint8Array): string {
  return crypto.createHash("sha256").update(bytes).digest("hex");
}

/**
 * Content-addressed file storage. Bytes land on disk under their digest before the
 * `file_asset` row is committed, so a visible row always has bytes behind it.
 */
export class ContentStore {
  private readonly store: PipelineStore;
  private readonly rootDir: string;
  private readonly logger: Logger;
  private readonly metrics: MetricsRegistry;
  private readonly clock: () => Date;

  constructor(deps: ContentStoreDeps) {
    this.store = deps.store;
    this.rootDir = path.resolve(deps.rootDir);
    this.logger = deps.logger;
    this.metrics = deps.metrics;
    this.clock = deps.clock ?? (() => new Date());
  }

  pathFor(fileHash: string): string {
    return path.join(this.rootDir, `${fileHash}.pdf`);
  }

  async put(bytes: Uint8Array, meta: PutMetadata): Promise<PutResult> {
    if (bytes.byteLength === 0) {
      throw new Error("refusing to store an empty file");
    }

    const fileHash = hashContent(bytes);
    const localPath = this.pathFor(fileHash);
    const existing = await this.store.getFileAsset(fileHash);
    if (existing && fs.existsSync(existing.localPath)) {
      this.metrics.incrementCounter("files_deduplicated");
      this.logger.debug("content_put_deduplicated", { fileHash });
      return { fileHash, created: false, asset: existing };
    }

    this.writeBytes(localPath, bytes);
    if (existing) {
      this.logger.warn("content_bytes_restored", { fileHash, localPath });
      return { fileHash, created: false, asset: existing };
    }

    const { asset, created } = await this.store.insertFileAssetIfAbsent({
      fileHash,
      filename: sanitizeFilename(meta.filename),
      sizeBytes: bytes.byteLength,
      sourceUrl: meta.sourceUrl,
      localPath,
      createdAt: this.clock().toISOString(),
    });

    if (created) {
      this.metrics.incrementCounter("files_ingested");
      this.logger.info("content_put_created", { fileHash, filename: asset.filename, sizeBytes: asset.sizeBytes });
    } else {
      this.metrics.incrementCounter("files_deduplicated");
    }
    return { fileHash, created, asset };
  }

  async exists(fileHash: string): Promise<boolean> {
    return (await this.store.getFileAsset(fileHash)) !== undefined;
  }

  async get(fileHash: string): Promise<StoredContent> {
    const asset = await this.store.getFileAsset(fileHash);
    if (!asset) {
      throw new NotFoundError("file", fileHash);
    }
    if (!fs.existsSync(asset.localPath)) {
      throw new StoreCorruptionError(fileHash, asset.localPath);
    }
    return { asset, bytes: fs.readFileSync(asset.localPath) };
  }

  async verifyIntegrity(batchSize = 500): Promise<IntegrityReport> {
    const missing: FileAsset[] = [];
    let checked = 0;
    let offset = 0;
    while (true) {
      const batch = await this.store.listFileAssets(batchSize, offset);
      if (batch.length === 0) {
        break;
      }
      for (const asset of batch) {
        checked += 1;
        if (!fs.existsSync(asset.localPath)) {
          missing.push(asset);
          this.logger.error("content_bytes_missing", { fileHash: asset.fileHash, localPath: asset.localPath });
        }
      }
      offset += batch.length;
    }
    return { checked, missing };
  }

  /** Administrative removal: drops the row (and everything cascading from it), then the bytes. */
  async remove(fileHash: string): Promise<boolean> {
    const asset = await this.store.getFileAsset(fileHash);
    if (!asset) {
      return false;
    }
    await this.store.deleteFileAsset(fileHash);
    fs.rmSync(asset.localPath, { force: true });
    this.logger.info("content_removed", { fileHash });
    return true;
  }

  private writeBytes(localPath: string, bytes: Uint8Array): void {
    fs.mkdirSync(path.dirname(localPath), { recursive: true });
    const tempPath = `${localPath}.${process.pid}.${crypto.randomUUID()}.part`;
    try {
      fs.writeFileSync(tempPath, bytes);
      fs.renameSync(tempPath, localPath);
    } catch (error) {
      fs.rmSync(tempPath, { force: true });
      throw error;
    }
  }
}
