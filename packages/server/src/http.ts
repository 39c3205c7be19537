import type { IncomingMessage, ServerResponse } from "node:http";
import {
  ErrorMessageSchema,
  FileListResponseSchema,
  FileMetaSchema,
  type ErrorMessage,
} from "@syncboard/protocol";
import type { Board } from "./board";
import type { BroadcastHub } from "./broadcastHub";
import { ERROR_CODES, type ErrorCode } from "./errors";
import { createLogger } from "./logger";

const log = createLogger("http");

const FILE_PATH_REGEX = /^\/files\/([^/]+)$/;

type HttpContext = {
  hub: BroadcastHub;
  board: Board;
};

function sendJson(
  res: ServerResponse,
  status: number,
  payload: unknown,
  headers: Record<string, string> = {},
) {
  const body = JSON.stringify(payload);
  res.writeHead(status, {
    ...headers,
    "Content-Type": "application/json; charset=utf-8",
    "Content-Length": Buffer.byteLength(body),
  });
  res.end(body);
}

function sendError(
  res: ServerResponse,
  status: number,
  code: ErrorCode,
  message: string,
  headers: Record<string, string> = {},
) {
  const payload: ErrorMessage = ErrorMessageSchema.parse({ type: "error", code, message });
  sendJson(res, status, payload, headers);
}

// Answers without reading the rest of the body; the socket closes once the reply is flushed.
function rejectUploadBody(res: ServerResponse, status: number, code: ErrorCode, message: string) {
  sendError(res, status, code, message, { Connection: "close" });
}

function headerValue(req: IncomingMessage, name: string): string | null {
  const value = req.headers[name];
  if (Array.isArray(value)) return value[0] ?? null;
  return value ?? null;
}

function decodeHeader(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

// RFC 6266 attachment header with a UTF-8 filename and an ASCII fallback.
export function contentDisposition(filename: string): string {
  const fallback = filename.replace(/[^\x20-\x7e]/g, "_").replace(/["\\]/g, "_");
  return `attachment; filename="${fallback}"; filename*=UTF-8''${encodeURIComponent(filename)}`;
}

type BodyResult = { ok: true; data: Buffer } | { ok: false; receivedBytes: number };

// Buffers the request body, giving up as soon as it passes `limitBytes`.
function readBody(req: IncomingMessage, limitBytes: number): Promise<BodyResult> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let received = 0;
    let settled = false;

    req.on("data", (chunk: Buffer) => {
      if (settled) return;
      received += chunk.length;
      if (received > limitBytes) {
        settled = true;
        chunks.length = 0;
        resolve({ ok: false, receivedBytes: received });
        return;
      }
      chunks.push(chunk);
    });

    req.on("end", () => {
      if (settled) return;
      settled = true;
      resolve({ ok: true, data: Buffer.concat(chunks) });
    });

    req.on("error", (error) => {
      if (settled) return;
      settled = true;
      reject(error);
    });
  });
}

async function handleUpload(
  ctx: HttpContext,
  req: IncomingMessage,
  res: ServerResponse,
  url: URL,
  maxFileSizeBytes: number,
) {
  const rawName = url.searchParams.get("filename") ?? headerValue(req, "x-filename");
  const filename = rawName ? decodeHeader(rawName).trim() : "";
  if (!filename) {
    rejectUploadBody(res, 400, ERROR_CODES.INVALID_MESSAGE, "No filename");
    return;
  }

  const clientId = headerValue(req, "x-client-id");
  const rawSender = url.searchParams.get("sender") ?? headerValue(req, "x-sender-name");
  const senderName = rawSender === null ? undefined : decodeHeader(rawSender);
  const mimeType = (headerValue(req, "content-type") ?? "").split(";")[0]?.trim() ?? "";

  const declared = Number(headerValue(req, "content-length"));
  if (Number.isFinite(declared) && declared > 0) {
    const admitted = ctx.hub.admitUpload(clientId, declared);
    if (!admitted.ok) {
      rejectUploadBody(res, 413, admitted.error.code, admitted.error.message);
      return;
    }
  }

  const body = await readBody(req, maxFileSizeBytes);
  if (!body.ok) {
    const admitted = ctx.hub.admitUpload(clientId, body.receivedBytes);
    const message = admitted.ok ? "File too large" : admitted.error.message;
    rejectUploadBody(res, 413, ERROR_CODES.PAYLOAD_TOO_LARGE, message);
    return;
  }

  const result = ctx.hub.onFileUpload(clientId, filename, mimeType, body.data, senderName);
  if (!result.ok) {
    sendError(res, 413, result.error.code, result.error.message);
    return;
  }

  sendJson(res, 201, FileMetaSchema.parse(result.value));
}

function handleDownload(ctx: HttpContext, res: ServerResponse, id: string) {
  const result = ctx.hub.onFileDownloadRequest(id);
  if (!result.ok) {
    // Expired and unknown files look the same to clients.
    sendError(res, 404, result.error.code, "File not found or expired");
    return;
  }

  const entry = result.value;
  res.writeHead(200, {
    "Content-Type": entry.mimeType,
    "Content-Length": entry.sizeBytes,
    "Content-Disposition": contentDisposition(entry.filename),
    "Cache-Control": "no-store",
  });
  res.end(entry.data);
}

function handleDelete(ctx: HttpContext, req: IncomingMessage, res: ServerResponse, id: string) {
  const removed = ctx.hub.onFileDelete(headerValue(req, "x-client-id"), id);
  if (!removed) {
    sendError(res, 404, ERROR_CODES.NOT_FOUND, "File not found");
    return;
  }

  res.writeHead(204);
  res.end();
}

// Request handler for the upload/download surface that sits beside the WebSocket.
export function createHttpHandler(ctx: HttpContext, maxFileSizeBytes: number) {
  return (req: IncomingMessage, res: ServerResponse) => {
    const url = new URL(req.url ?? "/", "http://localhost");
    const method = req.method ?? "GET";

    if (url.pathname === "/health" && method === "GET") {
      sendJson(res, 200, {
        status: "ok",
        clients: ctx.board.clients.size,
        files: ctx.board.files.size,
      });
      return;
    }

    if (url.pathname === "/upload" && method === "POST") {
      handleUpload(ctx, req, res, url, maxFileSizeBytes).catch((error: unknown) => {
        log.error("upload failed", error);
        if (!res.headersSent) {
          sendError(res, 500, ERROR_CODES.TRANSPORT_FAILURE, "Upload failed");
        } else {
          res.destroy();
        }
      });
      return;
    }

    if (url.pathname === "/files" && method === "GET") {
      sendJson(res, 200, FileListResponseSchema.parse({ files: ctx.board.files.list() }));
      return;
    }

    const match = FILE_PATH_REGEX.exec(url.pathname);
    if (match?.[1]) {
      const id = decodeHeader(match[1]);
      if (method === "GET") {
        handleDownload(ctx, res, id);
        return;
      }
      if (method === "DELETE") {
        handleDelete(ctx, req, res, id);
        return;
      }
    }

    sendError(res, 404, ERROR_CODES.NOT_FOUND, "Not found");
  };
}
