import { BoardError, ERROR_CODES } from "./errors";
import type { Client, Clock } from "./types";

// Live client connections keyed by transport-assigned id.
export class ConnectionRegistry {
  private clients = new Map<string, Client>();
  private now: Clock;

  constructor(now: Clock = Date.now) {
    this.now = now;
  }

  register(clientId: string): Client {
    if (this.clients.has(clientId)) {
      throw new BoardError(ERROR_CODES.DUPLICATE_CLIENT, `Client ${clientId} is already registered`);
    }

    const ts = this.now();
    const client: Client = { id: clientId, connectedAt: ts, lastSeenAt: ts };
    this.clients.set(clientId, client);
    return { ...client };
  }

  // Returns false when the client was already gone.
  unregister(clientId: string): boolean {
    return this.clients.delete(clientId);
  }

  has(clientId: string): boolean {
    return this.clients.has(clientId);
  }

  get(clientId: string): Client | null {
    const client = this.clients.get(clientId);
    return client ? { ...client } : null;
  }

  list(): Set<string> {
    return new Set(this.clients.keys());
  }

  get size(): number {
    return this.clients.size;
  }

  touch(clientId: string): boolean {
    const client = this.clients.get(clientId);
    if (!client) {
      return false;
    }

    client.lastSeenAt = this.now();
    return true;
  }

  // Clients not heard from since `cutoff`; candidates for heartbeat reaping.
  idleSince(cutoff: number): string[] {
    const idle: string[] = [];
    for (const client of this.clients.values()) {
      if (client.lastSeenAt < cutoff) {
        idle.push(client.id);
      }
    }
    return idle;
  }
}
