import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { WebSocketServer, type WebSocket } from "ws";
import { ConnError } from "../errors";
import { CLOSE_GRACE_MS, WebSocketTransport } from "./transport";

function portOf(server: WebSocketServer): number {
  const address = server.address();
  if (typeof address !== "object" || address === null) {
    throw new Error("server is not listening on a TCP port");
  }
  return address.port;
}

describe("WebSocketTransport", () => {
  let server: WebSocketServer;
  let url: string;
  let clients: WebSocket[];
  let received: string[];

  beforeEach(async () => {
    clients = [];
    received = [];
    server = new WebSocketServer({ host: "127.0.0.1", port: 0 });
    server.on("connection", (socket) => {
      clients.push(socket);
      socket.on("message", (data) => received.push(data.toString()));
    });
    await new Promise<void>((resolve) => server.once("listening", () => resolve()));
    url = `ws://127.0.0.1:${portOf(server)}`;
  });

  afterEach(async () => {
    for (const client of server.clients) client.terminate();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  it("sends text frames to the server", async () => {
    const transport = await WebSocketTransport.open(url, { connectTimeoutMs: 1000 });
    await transport.send("alice");

    await vi.waitFor(() => expect(received).toEqual(["alice"]));
    transport.close();
  });

  it("receives text frames as strings and binary frames as buffers", async () => {
    const transport = await WebSocketTransport.open(url, { connectTimeoutMs: 1000 });
    await vi.waitFor(() => expect(clients).toHaveLength(1));

    clients[0]?.send('{"msgType":"gameStatus","statusType":"died"}');
    clients[0]?.send(Buffer.from([1, 2, 3]));

    expect(await transport.receive()).toBe('{"msgType":"gameStatus","statusType":"died"}');
    expect(await transport.receive()).toEqual(Buffer.from([1, 2, 3]));
    transport.close();
  });

  it("rejects pending receives when the server closes", async () => {
    const transport = await WebSocketTransport.open(url, { connectTimeoutMs: 1000 });
    await vi.waitFor(() => expect(clients).toHaveLength(1));

    const pending = transport.receive();
    clients[0]?.close(1001, "restart");

    await expect(pending).rejects.toThrow("Connection closed by server (code 1001: restart)");
    await expect(transport.receive()).rejects.toBeInstanceOf(ConnError);
    await expect(transport.send("late")).rejects.toBeInstanceOf(ConnError);
  });

  it("fails pending receives immediately on close", async () => {
    const transport = await WebSocketTransport.open(url, { connectTimeoutMs: 1000 });
    const pending = transport.receive();

    transport.close();
    transport.close();

    await expect(pending).rejects.toThrow("Transport closed");
  });

  it("releases the socket once the server answers the close frame", async () => {
    const transport = await WebSocketTransport.open(url, { connectTimeoutMs: 1000 });
    const started = Date.now();

    transport.close();
    await transport.released;

    expect(Date.now() - started).toBeLessThan(CLOSE_GRACE_MS);
  });

  it("drops the socket when the server never answers the close frame", async () => {
    const stalled = new WebSocketServer({ host: "127.0.0.1", port: 0 });
    stalled.on("connection", (_socket, request) => request.socket.pause());
    await new Promise<void>((resolve) => stalled.once("listening", () => resolve()));

    try {
      const transport = await WebSocketTransport.open(`ws://127.0.0.1:${portOf(stalled)}`, {
        connectTimeoutMs: 1000,
      });
      const started = Date.now();

      transport.close();
      await transport.released;

      const elapsed = Date.now() - started;
      expect(elapsed).toBeGreaterThanOrEqual(CLOSE_GRACE_MS - 50);
      expect(elapsed).toBeLessThan(CLOSE_GRACE_MS + 1000);
    } finally {
      for (const client of stalled.clients) client.terminate();
      await new Promise<void>((resolve) => stalled.close(() => resolve()));
    }
  });

  it("rejects with ConnError when nothing is listening", async () => {
    const port = portOf(server);
    await new Promise<void>((resolve) => server.close(() => resolve()));
    server = new WebSocketServer({ noServer: true });

    await expect(
      WebSocketTransport.open(`ws://127.0.0.1:${port}`, { connectTimeoutMs: 1000 })
    ).rejects.toBeInstanceOf(ConnError);
  });

  it("rejects when cancelled before the connection opens", async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(
      WebSocketTransport.open(url, { connectTimeoutMs: 1000, signal: controller.signal })
    ).rejects.toThrow(`Connection to ${url} cancelled`);
  });
});
