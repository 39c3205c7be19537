import type {
  ClientToServerMessage,
  FileMeta,
  TextConflictMessage,
  TextUpdateMessage,
} from "@syncboard/protocol";
import type { Board } from "./board";
import type { TextUpdateError } from "./clipboardState";
import {
  ERROR_CODES,
  ok,
  type BoardError,
  type ErrorCode,
  type PayloadTooLargeError,
  type Result,
} from "./errors";
import type { FileLookupError } from "./fileStore";
import { createLogger } from "./logger";
import { Outbox } from "./outbox";
import type { BroadcastEvent, Client, ClipboardText, FileEntry } from "./types";

const log = createLogger("hub");

// What the hub needs from whatever carries events to clients.
export interface Transport {
  send(clientId: string, event: BroadcastEvent): Promise<void>;
  close(clientId: string, reason: string): void;
}

export type BroadcastHubOptions = {
  sendTimeoutMs: number;
  maxQueuedEvents: number;
  sweepIntervalMs: number;
  clientTimeoutMs: number;
  // Defaults to half the client timeout.
  livenessCheckIntervalMs?: number;
};

export type BoardCleared = {
  text: ClipboardText;
  removedFileIds: string[];
};

function toTextUpdate(text: ClipboardText): TextUpdateMessage {
  return { type: "text_update", ...text };
}

function toTextConflict(text: ClipboardText): TextConflictMessage {
  return { type: "text_conflict", ...text };
}

// Every board mutation goes through here and enqueues its events in the same turn.
export class BroadcastHub {
  private board: Board;
  private transport: Transport;
  private options: BroadcastHubOptions;
  private outboxes = new Map<string, Outbox>();
  private sweepTimer: NodeJS.Timeout | null = null;
  private livenessTimer: NodeJS.Timeout | null = null;

  constructor(board: Board, transport: Transport, options: BroadcastHubOptions) {
    this.board = board;
    this.transport = transport;
    this.options = options;
  }

  onClientConnected(clientId: string): Client {
    const client = this.board.clients.register(clientId);

    this.outboxes.set(
      clientId,
      new Outbox({
        send: (event) => this.transport.send(clientId, event),
        sendTimeoutMs: this.options.sendTimeoutMs,
        maxQueuedEvents: this.options.maxQueuedEvents,
        onFailure: (error) => this.handleTransportFailure(clientId, error),
      }),
    );

    // State sync on join goes to the newcomer only.
    this.unicast(clientId, { type: "welcome", clientId });
    this.unicast(clientId, toTextUpdate(this.board.clipboard.current()));
    this.unicast(clientId, { type: "file_list", files: this.board.files.list() });

    log.info(`client ${clientId} connected (${this.board.clients.size} online)`);
    this.broadcastPresence();
    return client;
  }

  onClientDisconnected(clientId: string): boolean {
    const outbox = this.outboxes.get(clientId);
    if (outbox) {
      outbox.close();
      this.outboxes.delete(clientId);
    }

    if (!this.board.clients.unregister(clientId)) {
      return false;
    }

    log.info(`client ${clientId} disconnected (${this.board.clients.size} online)`);
    this.broadcastPresence();
    return true;
  }

  onTextSubmit(
    clientId: string,
    content: string,
    expectedVersion: number,
    senderName?: string,
  ): Result<ClipboardText, TextUpdateError> {
    this.board.clients.touch(clientId);

    const result = this.board.clipboard.update(content, expectedVersion, clientId, senderName);
    if (result.ok) {
      this.broadcast(toTextUpdate(result.value));
      return result;
    }

    const error = result.error;
    if (error.code === ERROR_CODES.STALE_VERSION) {
      log.debug(
        `stale text from ${clientId}: expected v${expectedVersion}, current v${error.current.version}`,
      );
      this.unicast(clientId, toTextConflict(error.current));
    } else {
      this.replyError(clientId, error.code, error.message);
    }
    return result;
  }

  // Empties the text and drops every file for everyone.
  onClear(clientId: string): BoardCleared {
    this.board.clients.touch(clientId);

    const text = this.board.clipboard.clear(clientId);
    this.broadcast(toTextUpdate(text));

    const removedFileIds = this.board.files.clear();
    for (const id of removedFileIds) {
      this.broadcast({ type: "file_removed", id });
    }

    log.info(`board cleared by ${clientId} (${removedFileIds.length} file(s) removed)`);
    return { text, removedFileIds };
  }

  // Early size check while an upload is still streaming in.
  admitUpload(clientId: string | null, sizeBytes: number): Result<void, PayloadTooLargeError> {
    const tooLarge = this.board.files.checkSize(sizeBytes);
    if (!tooLarge) {
      return ok(undefined);
    }

    this.rejectUpload(clientId, tooLarge);
    return { ok: false, error: tooLarge };
  }

  onFileUpload(
    clientId: string | null,
    filename: string,
    mimeType: string,
    data: Buffer,
    uploaderName?: string,
  ): Result<FileMeta, PayloadTooLargeError> {
    if (clientId) {
      this.board.clients.touch(clientId);
    }

    if (!this.board.files.hasCapacityFor(data.length)) {
      this.periodicSweep();
    }

    const result = this.board.files.put(filename, mimeType, data, uploaderName);
    if (!result.ok) {
      this.rejectUpload(clientId, result.error);
      return result;
    }

    log.info(`file ${result.value.id} added (${result.value.filename}, ${result.value.sizeBytes} bytes)`);
    this.broadcast({ type: "file_added", ...result.value });
    return result;
  }

  onFileDownloadRequest(id: string): Result<FileEntry, FileLookupError> {
    return this.board.files.get(id);
  }

  onFileDelete(clientId: string | null, id: string): boolean {
    if (!this.board.files.remove(id)) {
      return false;
    }

    log.info(`file ${id} deleted${clientId ? ` by ${clientId}` : ""}`);
    this.broadcast({ type: "file_removed", id });
    return true;
  }

  onFileMetaRequest(clientId: string): void {
    this.board.clients.touch(clientId);
    this.unicast(clientId, { type: "file_list", files: this.board.files.list() });
  }

  onHeartbeat(clientId: string): void {
    this.board.clients.touch(clientId);
  }

  handleIntent(clientId: string, intent: ClientToServerMessage): void {
    switch (intent.type) {
      case "text":
        this.onTextSubmit(clientId, intent.content, intent.version, intent.senderName);
        break;
      case "clear":
        this.onClear(clientId);
        break;
      case "file_meta_request":
        this.onFileMetaRequest(clientId);
        break;
      case "file_delete":
        this.onFileDelete(clientId, intent.id);
        break;
      case "heartbeat":
        this.onHeartbeat(clientId);
        break;
    }
  }

  replyError(clientId: string, code: ErrorCode, message: string): void {
    this.unicast(clientId, { type: "error", code, message });
  }

  periodicSweep(): string[] {
    const removed = this.board.files.sweep();
    for (const id of removed) {
      this.broadcast({ type: "file_removed", id });
    }

    if (removed.length > 0) {
      log.info(`evicted ${removed.length} expired file(s)`);
    }
    return removed;
  }

  reapIdleClients(): string[] {
    const cutoff = this.board.now() - this.options.clientTimeoutMs;
    const idle = this.board.clients.idleSince(cutoff);
    for (const clientId of idle) {
      log.warn(`client ${clientId} missed heartbeats; dropping`);
      this.transport.close(clientId, "heartbeat timeout");
      this.onClientDisconnected(clientId);
    }
    return idle;
  }

  start(): void {
    this.stopTimers();

    this.sweepTimer = setInterval(() => this.periodicSweep(), this.options.sweepIntervalMs);
    this.sweepTimer.unref();

    const livenessMs =
      this.options.livenessCheckIntervalMs ?? Math.max(1, Math.floor(this.options.clientTimeoutMs / 2));
    this.livenessTimer = setInterval(() => this.reapIdleClients(), livenessMs);
    this.livenessTimer.unref();
  }

  stop(): void {
    this.stopTimers();
    for (const outbox of this.outboxes.values()) {
      outbox.close();
    }
    this.outboxes.clear();
  }

  // Resolves once every outbox has nothing left to send.
  async flush(): Promise<void> {
    for (;;) {
      const busy = Array.from(this.outboxes.values()).filter((outbox) => outbox.busy);
      if (busy.length === 0) {
        return;
      }
      await Promise.all(busy.map((outbox) => outbox.idle()));
    }
  }

  private broadcast(event: BroadcastEvent): void {
    for (const clientId of this.board.clients.list()) {
      this.unicast(clientId, event);
    }
  }

  private broadcastPresence(): void {
    this.broadcast({ type: "presence", count: this.board.clients.size });
  }

  private unicast(clientId: string, event: BroadcastEvent): void {
    this.outboxes.get(clientId)?.enqueue(event);
  }

  private rejectUpload(clientId: string | null, error: PayloadTooLargeError): void {
    log.warn(`upload rejected: ${error.message}`);
    if (clientId && this.board.clients.has(clientId)) {
      this.replyError(clientId, error.code, error.message);
    }
  }

  private handleTransportFailure(clientId: string, error: BoardError): void {
    log.warn(`send to ${clientId} failed: ${error.message}`);
    this.transport.close(clientId, error.code);
    this.onClientDisconnected(clientId);
  }

  private stopTimers(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
    if (this.livenessTimer) {
      clearInterval(this.livenessTimer);
      this.livenessTimer = null;
    }
  }
}
