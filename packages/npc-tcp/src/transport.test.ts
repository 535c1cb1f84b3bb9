import { describe, expect, it, vi } from "vitest";
import type { Server } from "node:net";
import { Duplex } from "node:stream";
import {
  type Message,
  Npc,
  decodeFrame,
  encodeFrame,
  messageDeliver,
  nonCancellable,
} from "@npc-rpc/core";

import { LengthPrefixedFramed } from "./framing.ts";
import { TransportError } from "./errors.ts";
import { attachSocket, connectTcp, listenTcp } from "./transport.ts";

async function flush(): Promise<void> {
  for (let i = 0; i < 3; i++) {
    await new Promise<void>((resolve) => setImmediate(resolve));
  }
}

function portOf(server: Server): number {
  const address = server.address();
  if (address === null || typeof address === "string") throw new Error("expected a TCP address");
  return address.port;
}

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}

/** Two in-memory streams wired back to back, like both ends of a socket. */
function socketPair(): [Duplex, Duplex] {
  const a: Duplex = new Duplex({
    read() {},
    write(chunk, _encoding, callback) {
      b.push(chunk);
      callback();
    },
  });
  const b: Duplex = new Duplex({
    read() {},
    write(chunk, _encoding, callback) {
      a.push(chunk);
      callback();
    },
  });
  return [a, b];
}

describe("attachSocket", () => {
  it("runs calls between two engines", async () => {
    const [a, b] = socketPair();
    const client = new Npc({ name: "client" });
    const server = new Npc({ name: "server" });
    attachSocket(client, a);
    attachSocket(server, b);
    server.on("download", (_param, notify, reply) => {
      notify("50%");
      reply({ bytes: 1024 });
      return nonCancellable();
    });

    const onReply = vi.fn();
    const onNotify = vi.fn();
    client.deliver("download", "a.txt", 0, onReply, onNotify);
    await flush();

    expect(onNotify).toHaveBeenCalledWith("50%");
    expect(onReply).toHaveBeenCalledWith({ bytes: 1024 }, null);
  });

  it("drops undecodable frames and keeps going", async () => {
    const [a, b] = socketPair();
    const server = new Npc();
    attachSocket(server, b);

    const peer = new LengthPrefixedFramed(a);
    const replies: Message[] = [];
    peer.onFrame((frame) => replies.push(decodeFrame(frame)));

    await peer.send(Buffer.from("not json"));
    await peer.send(Buffer.from('{"kind":9,"id":1}'));
    await peer.send(encodeFrame(messageDeliver(7, "foo")));
    await flush();

    expect(replies).toEqual([{ kind: 3, id: 7, error: "unimplemented" }]);
  });

  it("disconnects the engine when the socket closes", async () => {
    const [a] = socketPair();
    const client = new Npc();
    attachSocket(client, a);
    const onReply = vi.fn();
    client.deliver("slow", null, 0, onReply);

    a.destroy();
    await flush();

    expect(onReply).toHaveBeenCalledWith(null, "disconnected");
    expect(client.connected).toBe(false);
  });

  it("uses the socket error as the disconnect reason", async () => {
    const [a] = socketPair();
    const client = new Npc();
    attachSocket(client, a);
    const onReply = vi.fn();
    client.deliver("slow", null, 0, onReply);

    a.destroy(new Error("connection reset"));
    await flush();

    expect(onReply).toHaveBeenCalledWith(null, "connection reset");
  });

  it("detaches once with the given reason", async () => {
    const [a] = socketPair();
    const client = new Npc();
    const detach = attachSocket(client, a);
    const onReply = vi.fn();
    client.deliver("slow", null, 0, onReply);

    detach("shutdown");
    detach("again");
    await flush();

    expect(onReply).toHaveBeenCalledTimes(1);
    expect(onReply).toHaveBeenCalledWith(null, "shutdown");
    expect(a.destroyed).toBe(true);
  });
});

describe("connectTcp and listenTcp", () => {
  it("runs a call over a loopback connection", async () => {
    const peers: Npc[] = [];
    const server = await listenTcp(
      0,
      () => {
        const npc = new Npc({ name: "server" });
        npc.on("echo", (param, _notify, reply) => {
          reply(param);
          return nonCancellable();
        });
        peers.push(npc);
        return npc;
      },
      { host: "127.0.0.1" },
    );

    try {
      const client = new Npc({ name: "client" });
      const detach = await connectTcp(client, { port: portOf(server) });
      expect(client.connected).toBe(true);

      const result = await new Promise<[unknown, unknown]>((resolve) => {
        client.deliver("echo", "hi", 0, (param, error) => resolve([param, error]));
      });
      expect(result).toEqual(["hi", null]);
      expect(peers).toHaveLength(1);

      detach("done");
      expect(client.connected).toBe(false);
      await vi.waitFor(() => expect(peers[0]?.connected).toBe(false));
    } finally {
      await closeServer(server);
    }
  });

  it("rejects with an io error when nothing listens", async () => {
    const server = await listenTcp(0, () => new Npc(), { host: "127.0.0.1" });
    const port = portOf(server);
    await closeServer(server);

    const error = await connectTcp(new Npc(), { port }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransportError);
    if (!(error instanceof TransportError)) return;
    expect(error.kind).toBe("io");
    expect(error.message).toBe(`connect ECONNREFUSED 127.0.0.1:${port}`);
  });

  it("rejects with an io error when the port is taken", async () => {
    const server = await listenTcp(0, () => new Npc(), { host: "127.0.0.1" });

    try {
      const error = await listenTcp(portOf(server), () => new Npc(), { host: "127.0.0.1" }).catch(
        (e: unknown) => e,
      );

      expect(error).toBeInstanceOf(TransportError);
      if (!(error instanceof TransportError)) return;
      expect(error.kind).toBe("io");
    } finally {
      await closeServer(server);
    }
  });
});
