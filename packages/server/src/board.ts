import { ClipboardState } from "./clipboardState";
import type { ServerConfig } from "./config";
import { ConnectionRegistry } from "./connectionRegistry";
import { FileStore } from "./fileStore";
import type { Clock } from "./types";

export type BoardOptions = {
  fileTtlMs: number;
  maxFileSizeBytes: number;
  maxStorageBytes: number;
  maxTextSizeBytes: number;
  now?: Clock;
  generateFileId?: () => string;
};

// One shared board: its text, its files and the clients attached to it.
export class Board {
  readonly clipboard: ClipboardState;
  readonly files: FileStore;
  readonly clients: ConnectionRegistry;
  readonly now: Clock;

  constructor(options: BoardOptions) {
    this.now = options.now ?? Date.now;
    this.clipboard = new ClipboardState({
      maxTextSizeBytes: options.maxTextSizeBytes,
      now: this.now,
    });
    this.files = new FileStore({
      ttlMs: options.fileTtlMs,
      maxFileSizeBytes: options.maxFileSizeBytes,
      maxStorageBytes: options.maxStorageBytes,
      now: this.now,
      generateId: options.generateFileId,
    });
    this.clients = new ConnectionRegistry(this.now);
  }

  static fromConfig(config: ServerConfig, now?: Clock): Board {
    return new Board({
      fileTtlMs: config.fileTtlSeconds * 1000,
      maxFileSizeBytes: config.maxFileSizeBytes,
      maxStorageBytes: config.maxStorageBytes,
      maxTextSizeBytes: config.maxTextSizeBytes,
      now,
    });
  }

  // Releases stored file buffers; the board must not be used afterwards.
  close(): void {
    this.files.clear();
    for (const clientId of this.clients.list()) {
      this.clients.unregister(clientId);
    }
  }
}
