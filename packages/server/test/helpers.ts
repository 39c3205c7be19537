import type { Transport } from "../src/broadcastHub";
import type { BroadcastEvent } from "../src/types";

// Manually advanced clock for expiry and liveness tests.
export function createClock(start = 0) {
  let current = start;
  return {
    now: () => current,
    set(value: number) {
      current = value;
    },
    advance(ms: number) {
      current += ms;
    },
  };
}

// In-process stand-in for the WebSocket transport.
export class FakeTransport implements Transport {
  readonly sent = new Map<string, BroadcastEvent[]>();
  readonly closed: string[] = [];
  readonly failing = new Set<string>();
  readonly hanging = new Set<string>();

  async send(clientId: string, event: BroadcastEvent): Promise<void> {
    if (this.failing.has(clientId)) {
      throw new Error("socket hang up");
    }
    if (this.hanging.has(clientId)) {
      return new Promise<void>(() => {});
    }
    const events = this.sent.get(clientId) ?? [];
    events.push(event);
    this.sent.set(clientId, events);
  }

  close(clientId: string): void {
    this.closed.push(clientId);
  }

  eventsFor(clientId: string): BroadcastEvent[] {
    return this.sent.get(clientId) ?? [];
  }

  typesFor(clientId: string): string[] {
    return this.eventsFor(clientId).map((event) => event.type);
  }

  lastFor(clientId: string): BroadcastEvent | undefined {
    const events = this.eventsFor(clientId);
    return events[events.length - 1];
  }

  reset(): void {
    this.sent.clear();
  }
}
