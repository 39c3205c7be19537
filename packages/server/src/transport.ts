import { WebSocket } from "ws";
import type { Transport } from "./broadcastHub";
import { BoardError, ERROR_CODES } from "./errors";
import { createLogger } from "./logger";
import type { BroadcastEvent } from "./types";

const log = createLogger("transport");

// Maps client ids to their sockets and turns hub events into JSON frames.
export class WsTransport implements Transport {
  private sockets = new Map<string, WebSocket>();

  attach(clientId: string, socket: WebSocket): void {
    this.sockets.set(clientId, socket);
  }

  detach(clientId: string): void {
    this.sockets.delete(clientId);
  }

  send(clientId: string, event: BroadcastEvent): Promise<void> {
    const socket = this.sockets.get(clientId);
    if (!socket || socket.readyState !== WebSocket.OPEN) {
      return Promise.reject(
        new BoardError(ERROR_CODES.TRANSPORT_FAILURE, `Client ${clientId} is not connected`),
      );
    }

    const payload = JSON.stringify(event);
    return new Promise((resolve, reject) => {
      socket.send(payload, (error) => {
        if (error) {
          reject(new BoardError(ERROR_CODES.TRANSPORT_FAILURE, error.message));
          return;
        }
        resolve();
      });
    });
  }

  // Hard close: the peer is unresponsive or its sends are failing, so skip the close handshake.
  close(clientId: string, reason: string): void {
    const socket = this.sockets.get(clientId);
    if (!socket) {
      return;
    }

    log.debug(`terminating ${clientId}: ${reason}`);
    this.sockets.delete(clientId);
    socket.terminate();
  }

  closeAll(): void {
    for (const socket of this.sockets.values()) {
      socket.terminate();
    }
    this.sockets.clear();
  }

  // Protocol-level ping; pongs feed the registry's liveness tracking.
  pingAll(): void {
    for (const socket of this.sockets.values()) {
      if (socket.readyState === WebSocket.OPEN) {
        socket.ping();
      }
    }
  }
}
