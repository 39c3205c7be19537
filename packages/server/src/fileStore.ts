import crypto from "node:crypto";
import type { FileMeta } from "@syncboard/protocol";
import {
  ERROR_CODES,
  fail,
  ok,
  type ExpiredError,
  type NotFoundError,
  type PayloadTooLargeError,
  type Result,
} from "./errors";
import { normalizeSenderName } from "./names";
import type { Clock, FileEntry } from "./types";

const DEFAULT_MIME_TYPE = "application/octet-stream";
const MAX_FILENAME_LENGTH = 255;

export type FileStoreOptions = {
  ttlMs: number;
  maxFileSizeBytes: number;
  // Aggregate cap across every stored entry, expired or not, since there is no disk to spill to.
  maxStorageBytes: number;
  now?: Clock;
  generateId?: () => string;
};

export type FileLookupError = NotFoundError | ExpiredError;

// Keeps only the last path segment so a filename can never address anything but itself.
export function normalizeFilename(filename: string): string {
  const segments = filename.split(/[\\/]/);
  const base = (segments[segments.length - 1] ?? "").trim();
  if (!base || base === "." || base === "..") {
    return "file";
  }
  return base.slice(0, MAX_FILENAME_LENGTH);
}

export function toFileMeta(entry: FileEntry): FileMeta {
  const { data: _data, ...meta } = entry;
  return meta;
}

// Readable while `now < expiresAt`; `sweep` drops `expiresAt <= now`.
export class FileStore {
  private entries = new Map<string, FileEntry>();
  private storedBytes = 0;
  private ttlMs: number;
  private maxFileSizeBytes: number;
  private maxStorageBytes: number;
  private now: Clock;
  private generateId: () => string;

  constructor(options: FileStoreOptions) {
    this.ttlMs = options.ttlMs;
    this.maxFileSizeBytes = options.maxFileSizeBytes;
    this.maxStorageBytes = options.maxStorageBytes;
    this.now = options.now ?? Date.now;
    this.generateId = options.generateId ?? (() => crypto.randomUUID());
  }

  get size(): number {
    return this.entries.size;
  }

  get totalBytes(): number {
    return this.storedBytes;
  }

  // Per-file limit only; usable before an upload body has been read in full.
  checkSize(sizeBytes: number): PayloadTooLargeError | null {
    if (sizeBytes > this.maxFileSizeBytes) {
      return {
        code: ERROR_CODES.PAYLOAD_TOO_LARGE,
        limitBytes: this.maxFileSizeBytes,
        actualBytes: sizeBytes,
        message: `File is ${sizeBytes} bytes; the limit is ${this.maxFileSizeBytes}`,
      };
    }
    return null;
  }

  hasCapacityFor(sizeBytes: number): boolean {
    return this.storedBytes + sizeBytes <= this.maxStorageBytes;
  }

  put(
    filename: string,
    mimeType: string,
    data: Buffer,
    uploaderName?: string,
  ): Result<FileMeta, PayloadTooLargeError> {
    const tooLarge = this.checkSize(data.length);
    if (tooLarge) {
      return fail(tooLarge);
    }

    if (!this.hasCapacityFor(data.length)) {
      return fail({
        code: ERROR_CODES.PAYLOAD_TOO_LARGE,
        limitBytes: this.maxStorageBytes - this.storedBytes,
        actualBytes: data.length,
        message: `Board storage is full (${this.storedBytes} of ${this.maxStorageBytes} bytes used)`,
      });
    }

    const uploadedAt = this.now();
    const name = normalizeSenderName(uploaderName);
    const entry: FileEntry = {
      id: this.allocateId(),
      filename: normalizeFilename(filename),
      mimeType: mimeType.trim() || DEFAULT_MIME_TYPE,
      sizeBytes: data.length,
      uploadedAt,
      expiresAt: uploadedAt + this.ttlMs,
      ...(name ? { uploadedByName: name } : {}),
      data: Buffer.from(data),
    };

    this.entries.set(entry.id, entry);
    this.storedBytes += entry.sizeBytes;
    return ok(toFileMeta(entry));
  }

  get(id: string): Result<FileEntry, FileLookupError> {
    const entry = this.entries.get(id);
    if (!entry) {
      return fail({ code: ERROR_CODES.NOT_FOUND, id });
    }

    if (this.now() >= entry.expiresAt) {
      return fail({ code: ERROR_CODES.EXPIRED, id, expiredAt: entry.expiresAt });
    }

    return ok(entry);
  }

  remove(id: string): boolean {
    const entry = this.entries.get(id);
    if (!entry) {
      return false;
    }

    this.entries.delete(id);
    this.storedBytes -= entry.sizeBytes;
    return true;
  }

  // Removes every entry with `expiresAt <= now` and returns their ids in upload order.
  sweep(now: number = this.now()): string[] {
    const removed: string[] = [];
    for (const entry of this.entries.values()) {
      if (entry.expiresAt <= now) {
        removed.push(entry.id);
      }
    }

    for (const id of removed) {
      this.remove(id);
    }
    return removed;
  }

  list(now: number = this.now()): FileMeta[] {
    const live: FileMeta[] = [];
    for (const entry of this.entries.values()) {
      if (now < entry.expiresAt) {
        live.push(toFileMeta(entry));
      }
    }
    return live;
  }

  clear(): string[] {
    const ids = Array.from(this.entries.keys());
    this.entries.clear();
    this.storedBytes = 0;
    return ids;
  }

  private allocateId(): string {
    let id = this.generateId();
    while (this.entries.has(id)) {
      id = this.generateId();
    }
    return id;
  }
}
