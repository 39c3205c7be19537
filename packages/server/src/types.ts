import type { FileMeta, ServerToClientMessage } from "@syncboard/protocol";

// Millisecond wall clock; injected so expiry and liveness can be tested deterministically.
export type Clock = () => number;

// A live connection as tracked by the registry.
export type Client = {
  id: string;
  connectedAt: number;
  lastSeenAt: number;
};

// The single authoritative text value of a board.
export type ClipboardText = {
  content: string;
  version: number;
  updatedAt: number;
  updatedBy: string | null;
  // Display name the author chose, when one was given.
  updatedByName?: string;
};

// Stored file with its bytes; never mutated after creation.
export type FileEntry = FileMeta & {
  data: Buffer;
};

export type BroadcastEvent = ServerToClientMessage;
