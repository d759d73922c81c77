import type { ServerEvent } from "@lan-board/protocol";
import { ServerEventSchema } from "@lan-board/protocol";

export type FakeSendBehavior = "ack" | "fail" | "hang" | "throw";

/** In-process stand-in for a `ws` socket. */
export class FakeClient {
  readyState = 1;
  bufferedAmount = 0;
  readonly sent: string[] = [];
  terminated = false;
  closed: { code: number; reason: string } | undefined;

  constructor(
    readonly name: string,
    private readonly behavior: FakeSendBehavior = "ack",
  ) {}

  send(data: string, cb: (err?: Error) => void): void {
    if (this.behavior === "throw") throw new Error(`${this.name} cannot send`);
    this.sent.push(data);
    if (this.behavior === "ack") cb();
    if (this.behavior === "fail") cb(new Error(`${this.name} send failed`));
  }

  terminate(): void {
    this.terminated = true;
    this.readyState = 3;
  }

  close(code: number, reason: string): void {
    this.closed = { code, reason };
    this.readyState = 3;
  }

  events(): ServerEvent[] {
    return this.sent.map((data) => ServerEventSchema.parse(JSON.parse(data)));
  }
}
