import type { ServerEvent } from "@lan-board/protocol";
import type { Log } from "../log.js";
import { WS_READY_STATE_OPEN } from "./constants.js";

/**
 * The part of a WebSocket the registry needs. A `ws` socket satisfies it structurally.
 */
export type BoardClient = {
  readonly readyState: number;
  readonly bufferedAmount: number;
  send(data: string, cb: (err?: Error) => void): void;
  terminate(): void;
};

export type DeliveryFailure = "not_open" | "backpressure" | "send_error" | "timeout";

/** Raised by the heartbeat monitor rather than by a delivery. */
export type LivenessFailure = "heartbeat_timeout" | "ping_failed";

export type PruneReason = DeliveryFailure | LivenessFailure;

export type DeliveryOutcome = { ok: true } | { ok: false; reason: DeliveryFailure };

export type BroadcastReport = Readonly<{
  delivered: number;
  pruned: number;
}>;

export type ConnectionRegistryOptions = Readonly<{
  sendTimeoutMs: number;
  maxBufferedBytes: number;
  log: Log;
}>;

/**
 * Live clients of the board.
 *
 * Invariants:
 * - A client in the set can receive, or the delivery that finds out it cannot removes it.
 * - Every send of a broadcast is dispatched synchronously inside `broadcast()`; only the wait
 *   for acknowledgements is asynchronous. Callers rely on this for bootstrap ordering.
 * - One slow client never delays the others past `sendTimeoutMs`.
 */
export class ConnectionRegistry<C extends BoardClient = BoardClient> {
  private readonly clients = new Set<C>();

  constructor(private readonly options: ConnectionRegistryOptions) {}

  register(client: C): void {
    this.clients.add(client);
  }

  unregister(client: C): boolean {
    return this.clients.delete(client);
  }

  has(client: C): boolean {
    return this.clients.has(client);
  }

  get size(): number {
    return this.clients.size;
  }

  /** Drops a client that stopped answering pings. */
  evict(client: C, reason: LivenessFailure): void {
    this.prune(client, reason);
  }

  /** Throws only when `event` cannot be serialized. */
  async broadcast(event: ServerEvent): Promise<BroadcastReport> {
    const data = JSON.stringify(event);
    const attempts = [...this.clients].map((client) => this.deliverOrPrune(client, data));
    const outcomes = await Promise.all(attempts);

    let delivered = 0;
    for (const outcome of outcomes) if (outcome.ok) delivered += 1;
    return { delivered, pruned: outcomes.length - delivered };
  }

  /** Sends one event to one client, pruning it on failure like a broadcast would. */
  send(client: C, event: ServerEvent): Promise<DeliveryOutcome> {
    return this.deliverOrPrune(client, JSON.stringify(event));
  }

  private async deliverOrPrune(client: C, data: string): Promise<DeliveryOutcome> {
    const outcome = await this.deliver(client, data);
    if (!outcome.ok) this.prune(client, outcome.reason);
    return outcome;
  }

  private deliver(client: C, data: string): Promise<DeliveryOutcome> {
    if (client.readyState !== WS_READY_STATE_OPEN) {
      return Promise.resolve({ ok: false, reason: "not_open" });
    }
    if (client.bufferedAmount > this.options.maxBufferedBytes) {
      return Promise.resolve({ ok: false, reason: "backpressure" });
    }

    return new Promise<DeliveryOutcome>((resolve) => {
      let settled = false;
      const settle = (outcome: DeliveryOutcome) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        resolve(outcome);
      };

      const timer = setTimeout(
        () => settle({ ok: false, reason: "timeout" }),
        this.options.sendTimeoutMs,
      );

      try {
        client.send(data, (err) => settle(err ? { ok: false, reason: "send_error" } : { ok: true }));
      } catch {
        settle({ ok: false, reason: "send_error" });
      }
    });
  }

  private prune(client: C, reason: PruneReason): void {
    const wasRegistered = this.clients.delete(client);
    if (reason !== "not_open") client.terminate();
    this.options.log({ type: "client_pruned", reason, wasRegistered, remaining: this.clients.size });
  }
}
