import type { LivenessFailure } from "../board/connectionRegistry.js";

/** The part of a server-side `ws` socket the monitor drives. */
export type HeartbeatSocket = {
  ping(): void;
  on(event: "pong", listener: () => void): unknown;
  off(event: "pong", listener: () => void): unknown;
};

export type UnresponsiveSocket<S extends HeartbeatSocket> = Readonly<{
  socket: S;
  connectionId: string;
  reason: LivenessFailure;
  silentMs: number;
}>;

export type HeartbeatMonitorOptions<S extends HeartbeatSocket> = Readonly<{
  pingIntervalMs: number;
  pongTimeoutMs: number;
  onUnresponsive: (peer: UnresponsiveSocket<S>) => void;
  nowMs?: () => number;
}>;

type Tracked = {
  connectionId: string;
  lastPongAtMs: number;
  onPong: () => void;
};

/**
 * One ping loop for every accepted socket.
 *
 * A socket silent for longer than `pongTimeoutMs` (or one that can no longer be pinged) is
 * dropped from the monitor and handed to `onUnresponsive` exactly once; the caller decides how
 * to evict it.
 */
export class HeartbeatMonitor<S extends HeartbeatSocket> {
  private readonly sockets = new Map<S, Tracked>();
  private readonly nowMs: () => number;
  private readonly timer: NodeJS.Timeout;

  constructor(private readonly options: HeartbeatMonitorOptions<S>) {
    if (!(options.pingIntervalMs > 0 && options.pingIntervalMs <= options.pongTimeoutMs)) {
      throw new Error("heartbeat needs 0 < pingIntervalMs <= pongTimeoutMs");
    }
    this.nowMs = options.nowMs ?? (() => Date.now());
    this.timer = setInterval(() => this.sweep(), options.pingIntervalMs);
    this.timer.unref();
  }

  get size(): number {
    return this.sockets.size;
  }

  track(socket: S, connectionId: string): void {
    this.untrack(socket);
    const tracked: Tracked = {
      connectionId,
      lastPongAtMs: this.nowMs(),
      onPong: () => {
        tracked.lastPongAtMs = this.nowMs();
      },
    };
    socket.on("pong", tracked.onPong);
    this.sockets.set(socket, tracked);
  }

  untrack(socket: S): void {
    const tracked = this.sockets.get(socket);
    if (!tracked) return;
    socket.off("pong", tracked.onPong);
    this.sockets.delete(socket);
  }

  sweep(): void {
    const now = this.nowMs();
    for (const [socket, tracked] of this.sockets) {
      const silentMs = now - tracked.lastPongAtMs;
      if (silentMs > this.options.pongTimeoutMs) {
        this.drop(socket, tracked, "heartbeat_timeout", silentMs);
        continue;
      }
      try {
        socket.ping();
      } catch {
        // ws throws here only once the socket has left the OPEN state.
        this.drop(socket, tracked, "ping_failed", silentMs);
      }
    }
  }

  stop(): void {
    clearInterval(this.timer);
    for (const socket of [...this.sockets.keys()]) this.untrack(socket);
  }

  private drop(socket: S, tracked: Tracked, reason: LivenessFailure, silentMs: number): void {
    this.untrack(socket);
    this.options.onUnresponsive({ socket, connectionId: tracked.connectionId, reason, silentMs });
  }
}
