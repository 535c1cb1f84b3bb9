// Tests for message tracing

import { describe, it, expect, vi } from "vitest";
import { messageAck, messageCancel, messageDeliver, messageEmit } from "@npc-rpc/wire";
import type { Message } from "@npc-rpc/wire";

import { describeMessage, logger, traceReceive, traceSend } from "./logging.ts";

describe("describeMessage", () => {
  it("renders kind, id and method", () => {
    const { line, details } = describeMessage("→", messageDeliver(7, "download", "a.txt"), false);

    expect(line).toBe("→ Deliver #7 download");
    expect(details).toEqual({ kind: "Deliver", id: 7, method: "download" });
  });

  it("includes params only when asked", () => {
    const { details } = describeMessage("←", messageDeliver(7, "download", "a.txt"), true);

    expect(details).toEqual({ kind: "Deliver", id: 7, method: "download", param: "a.txt" });
  });

  it("marks errors and always includes them", () => {
    const { line, details } = describeMessage("←", messageAck(7, null, "unimplemented"), false);

    expect(line).toBe("← Ack #7 ✗");
    expect(details).toEqual({ kind: "Ack", id: 7, error: "unimplemented" });
  });

  it("omits the id of an Emit that has none", () => {
    const { line } = describeMessage("→", messageEmit("log"), false);

    expect(line).toBe("→ Emit log");
  });
});

describe("traceSend", () => {
  it("logs each message before sending it", () => {
    const order: string[] = [];
    const send = traceSend(
      (m) => {
        order.push(`send ${m.kind}`);
      },
      { log: (line) => order.push(line) },
    );

    send(messageCancel(3));

    expect(order).toEqual(["→ Cancel #3", "send 4"]);
  });

  it("forwards the message unchanged", () => {
    const sent: Message[] = [];
    const message = messageDeliver(1, "ping", { secret: "test-secret" });
    const log = vi.fn();

    traceSend((m) => sent.push(m), { log })(message);

    expect(sent).toEqual([message]);
    expect(log).toHaveBeenCalledWith("→ Deliver #1 ping", { kind: "Deliver", id: 1, method: "ping" });
  });

  it("logs to the debug namespace when no sink is given", () => {
    const send = vi.fn();

    expect(() => traceSend(send, { namespace: "npc:test" })(messageCancel(1))).not.toThrow();
    expect(send).toHaveBeenCalledTimes(1);
  });
});

describe("traceReceive", () => {
  it("logs inbound messages with params when enabled", () => {
    const received: Message[] = [];
    const log = vi.fn();

    traceReceive((m) => received.push(m), { log, logParams: true })(messageAck(2, 42));

    expect(received).toEqual([{ kind: 3, id: 2, param: 42 }]);
    expect(log).toHaveBeenCalledWith("← Ack #2", { kind: "Ack", id: 2, param: 42 });
  });
});

describe("logger", () => {
  it("prefixes the namespace", () => {
    expect(logger("tcp").namespace).toBe("npc:tcp");
  });
});
