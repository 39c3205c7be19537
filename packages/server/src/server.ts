import crypto from "node:crypto";
import { createServer } from "node:http";
import { WebSocketServer, type RawData, type WebSocket } from "ws";
import { ClientToServerMessageSchema } from "@syncboard/protocol";
import { Board } from "./board";
import { BroadcastHub } from "./broadcastHub";
import type { ServerConfig } from "./config";
import { ERROR_CODES } from "./errors";
import { createHttpHandler } from "./http";
import { createLogger } from "./logger";
import { WsTransport } from "./transport";
import type { Clock } from "./types";

const log = createLogger("server");

// JSON escaping can inflate text up to six bytes per UTF-8 byte, plus the envelope.
const TEXT_FRAME_OVERHEAD_FACTOR = 6;
const TEXT_FRAME_SLACK_BYTES = 64 * 1024;

// Largest frame that can still carry text within `maxTextSizeBytes`.
export function textFrameLimit(maxTextSizeBytes: number): number {
  return maxTextSizeBytes * TEXT_FRAME_OVERHEAD_FACTOR + TEXT_FRAME_SLACK_BYTES;
}

function rawByteLength(data: RawData): number {
  if (Array.isArray(data)) {
    return data.reduce((total, chunk) => total + chunk.length, 0);
  }
  return data.byteLength;
}

function rawText(data: RawData): string {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString("utf8");
  }
  if (Buffer.isBuffer(data)) {
    return data.toString("utf8");
  }
  return Buffer.from(data).toString("utf8");
}

function handleMessage(hub: BroadcastHub, clientId: string, data: RawData, frameLimit: number) {
  const sizeBytes = rawByteLength(data);
  if (sizeBytes > frameLimit) {
    hub.replyError(
      clientId,
      ERROR_CODES.PAYLOAD_TOO_LARGE,
      `Message is ${sizeBytes} bytes; the limit is ${frameLimit}`,
    );
    return;
  }

  let message: unknown;
  try {
    message = JSON.parse(rawText(data));
  } catch {
    hub.replyError(clientId, ERROR_CODES.INVALID_MESSAGE, "Message must be JSON");
    return;
  }

  const parsed = ClientToServerMessageSchema.safeParse(message);
  if (!parsed.success) {
    hub.replyError(clientId, ERROR_CODES.INVALID_MESSAGE, "Unknown or malformed message");
    return;
  }

  hub.handleIntent(clientId, parsed.data);
}

function handleConnection(
  hub: BroadcastHub,
  transport: WsTransport,
  socket: WebSocket,
  frameLimit: number,
) {
  const clientId = crypto.randomUUID();
  transport.attach(clientId, socket);

  socket.on("message", (data) => handleMessage(hub, clientId, data, frameLimit));
  socket.on("pong", () => hub.onHeartbeat(clientId));
  socket.on("close", () => {
    transport.detach(clientId);
    hub.onClientDisconnected(clientId);
  });
  socket.on("error", (error) => {
    log.warn(`socket error for ${clientId}: ${error.message}`);
  });

  try {
    hub.onClientConnected(clientId);
  } catch (error) {
    log.error(`rejecting connection ${clientId}`, error);
    transport.close(clientId, "registration failed");
  }
}

export type RunningServer = {
  port: number;
  host: string;
  board: Board;
  hub: BroadcastHub;
  close: () => Promise<void>;
};

export type StartServerOptions = {
  now?: Clock;
};

// Starts the HTTP + WebSocket server for one shared board.
export async function startServer(
  config: ServerConfig,
  options: StartServerOptions = {},
): Promise<RunningServer> {
  const board = Board.fromConfig(config, options.now);
  const transport = new WsTransport();
  const hub = new BroadcastHub(board, transport, {
    sendTimeoutMs: config.sendTimeoutMs,
    maxQueuedEvents: config.maxQueuedEvents,
    sweepIntervalMs: config.sweepIntervalSeconds * 1000,
    clientTimeoutMs: config.clientTimeoutSeconds * 1000,
  });

  const frameLimit = textFrameLimit(config.maxTextSizeBytes);
  const httpServer = createServer(createHttpHandler({ hub, board }, config.maxFileSizeBytes));
  // Frames between the text limit and this cap get a payload_too_large reply and stay connected.
  const wss = new WebSocketServer({
    server: httpServer,
    path: "/ws",
    maxPayload: Math.max(config.maxFrameBytes, frameLimit),
  });

  wss.on("connection", (socket) => handleConnection(hub, transport, socket, frameLimit));

  await new Promise<void>((resolve, reject) => {
    httpServer.once("error", reject);
    httpServer.listen(config.port, config.host, () => {
      httpServer.off("error", reject);
      resolve();
    });
  });

  hub.start();
  const pingTimer = setInterval(() => transport.pingAll(), config.heartbeatIntervalSeconds * 1000);
  pingTimer.unref();

  const address = httpServer.address();
  const resolvedPort = typeof address === "string" ? config.port : address?.port ?? config.port;

  return {
    port: resolvedPort,
    host: config.host,
    board,
    hub,
    close: () =>
      new Promise((resolve, reject) => {
        clearInterval(pingTimer);
        hub.stop();
        transport.closeAll();
        wss.close((err) => {
          httpServer.closeAllConnections();
          httpServer.close(() => {
            board.close();
            if (err) {
              reject(err);
              return;
            }
            resolve();
          });
        });
      }),
  };
}
