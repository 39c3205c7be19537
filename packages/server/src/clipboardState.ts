import {
  ERROR_CODES,
  fail,
  ok,
  type PayloadTooLargeError,
  type Result,
  type StaleVersionError,
} from "./errors";
import { normalizeSenderName } from "./names";
import type { ClipboardText, Clock } from "./types";

export type ClipboardStateOptions = {
  maxTextSizeBytes: number;
  now?: Clock;
};

export type TextUpdateError = StaleVersionError | PayloadTooLargeError;

// Board text under optimistic concurrency: the first update for a version wins.
export class ClipboardState {
  private state: ClipboardText;
  private maxTextSizeBytes: number;
  private now: Clock;

  constructor(options: ClipboardStateOptions) {
    this.maxTextSizeBytes = options.maxTextSizeBytes;
    this.now = options.now ?? Date.now;
    this.state = { content: "", version: 0, updatedAt: this.now(), updatedBy: null };
  }

  current(): ClipboardText {
    return { ...this.state };
  }

  update(
    newContent: string,
    expectedVersion: number,
    authorClientId: string,
    authorName?: string,
  ): Result<ClipboardText, TextUpdateError> {
    const sizeBytes = Buffer.byteLength(newContent, "utf8");
    if (sizeBytes > this.maxTextSizeBytes) {
      return fail({
        code: ERROR_CODES.PAYLOAD_TOO_LARGE,
        limitBytes: this.maxTextSizeBytes,
        actualBytes: sizeBytes,
        message: `Text is ${sizeBytes} bytes; the limit is ${this.maxTextSizeBytes}`,
      });
    }

    if (expectedVersion !== this.state.version) {
      return fail({ code: ERROR_CODES.STALE_VERSION, current: this.current() });
    }

    this.stamp(newContent, authorClientId, authorName);
    return ok(this.current());
  }

  // Empties the text as a new version.
  clear(authorClientId: string, authorName?: string): ClipboardText {
    this.stamp("", authorClientId, authorName);
    return this.current();
  }

  private stamp(content: string, authorClientId: string, authorName: string | undefined) {
    const name = normalizeSenderName(authorName);
    this.state = {
      content,
      version: this.state.version + 1,
      updatedAt: this.now(),
      updatedBy: authorClientId,
      ...(name ? { updatedByName: name } : {}),
    };
  }
}
