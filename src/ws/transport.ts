/**
 * WebSocket transport
 * Turns the `ws` event stream into a pull-based receive() so the control loop
 * can suspend on the next frame.
 */

import WebSocket from "ws";
import { ConnError } from "../errors";

/**
 * One inbound frame: text frames as strings, binary frames as Buffers
 */
export type RawFrame = string | Buffer;

export interface Transport {
  send(data: string): Promise<void>;
  /**
   * Resolve with the next frame; rejects with ConnError once the channel is gone
   */
  receive(): Promise<RawFrame>;
  close(): void;
}

export interface TransportOptions {
  connectTimeoutMs: number;
  /**
   * Aborting cancels a connection attempt still in progress
   */
  signal?: AbortSignal;
}

/**
 * How long close() waits for the server to answer the close frame
 * before dropping the socket
 */
export const CLOSE_GRACE_MS = 1000;

export type TransportFactory = (url: string, options: TransportOptions) => Promise<Transport>;

interface Waiter {
  resolve: (frame: RawFrame) => void;
  reject: (error: ConnError) => void;
}

function toFrame(data: WebSocket.RawData, isBinary: boolean): RawFrame {
  const buffer = Buffer.isBuffer(data)
    ? data
    : Array.isArray(data)
      ? Buffer.concat(data)
      : Buffer.from(data);
  return isBinary ? buffer : buffer.toString("utf8");
}

export class WebSocketTransport implements Transport {
  private frames: RawFrame[] = [];
  private waiters: Waiter[] = [];
  private failure: ConnError | null = null;

  /**
   * Resolves once the underlying socket has been released
   */
  readonly released: Promise<void>;

  private constructor(private readonly ws: WebSocket) {
    this.released = new Promise((resolve) => {
      ws.once("close", () => resolve());
    });

    ws.on("message", (data: WebSocket.RawData, isBinary: boolean) => {
      const frame = toFrame(data, isBinary);
      const waiter = this.waiters.shift();
      if (waiter) {
        waiter.resolve(frame);
      } else {
        this.frames.push(frame);
      }
    });

    ws.on("error", (error: Error) => {
      this.fail(new ConnError("WebSocket error", { cause: error }));
    });

    ws.on("close", (code: number, reason: Buffer) => {
      const detail = reason.length > 0 ? `: ${reason.toString("utf8")}` : "";
      this.fail(new ConnError(`Connection closed by server (code ${code}${detail})`));
    });
  }

  /**
   * Open a connection; rejects with ConnError on failure or timeout
   */
  static open(url: string, options: TransportOptions): Promise<WebSocketTransport> {
    return new Promise((resolve, reject) => {
      let ws: WebSocket;
      try {
        ws = new WebSocket(url);
      } catch (error) {
        reject(new ConnError(`Cannot connect to ${url}`, { cause: error }));
        return;
      }

      const cleanup = (): void => {
        clearTimeout(connectTimeout);
        options.signal?.removeEventListener("abort", onAbort);
        ws.off("open", onOpen);
        ws.off("error", onError);
        ws.off("close", onClose);
      };

      // Keeps the abort error emitted by terminate() from going unhandled
      const giveUp = (error: ConnError): void => {
        cleanup();
        ws.on("error", () => undefined);
        ws.terminate();
        reject(error);
      };

      const onOpen = (): void => {
        cleanup();
        resolve(new WebSocketTransport(ws));
      };

      const onError = (error: Error): void => {
        cleanup();
        ws.terminate();
        reject(new ConnError(`Failed to connect to ${url}`, { cause: error }));
      };

      const onClose = (code: number): void => {
        cleanup();
        reject(new ConnError(`Connection to ${url} closed during handshake (code ${code})`));
      };

      const onAbort = (): void => {
        giveUp(new ConnError(`Connection to ${url} cancelled`));
      };

      const connectTimeout = setTimeout(() => {
        giveUp(new ConnError(`Connection to ${url} timed out after ${options.connectTimeoutMs}ms`));
      }, options.connectTimeoutMs);

      if (options.signal?.aborted) {
        onAbort();
        return;
      }
      options.signal?.addEventListener("abort", onAbort, { once: true });
      ws.on("open", onOpen);
      ws.on("error", onError);
      ws.on("close", onClose);
    });
  }

  send(data: string): Promise<void> {
    if (this.failure) return Promise.reject(this.failure);
    if (this.ws.readyState !== WebSocket.OPEN) {
      return Promise.reject(new ConnError("WebSocket is not connected"));
    }

    return new Promise((resolve, reject) => {
      this.ws.send(data, (error?: Error) => {
        if (error) {
          reject(new ConnError("Failed to send frame", { cause: error }));
        } else {
          resolve();
        }
      });
    });
  }

  receive(): Promise<RawFrame> {
    const frame = this.frames.shift();
    if (frame !== undefined) return Promise.resolve(frame);
    if (this.failure) return Promise.reject(this.failure);

    return new Promise((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  /**
   * Close without waiting for the server's close frame. Idempotent.
   * The socket is terminated if the server has not answered within CLOSE_GRACE_MS.
   */
  close(): void {
    if (this.failure) return;
    this.fail(new ConnError("Transport closed"));
    this.ws.close(1000, "Client shutting down");

    const ws = this.ws;
    const grace = setTimeout(() => ws.terminate(), CLOSE_GRACE_MS);
    grace.unref();
    ws.once("close", () => clearTimeout(grace));
  }

  private fail(error: ConnError): void {
    if (this.failure) return;
    this.failure = error;
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter.reject(error);
    }
  }
}

export const openWebSocketTransport: TransportFactory = (url, options) =>
  WebSocketTransport.open(url, options);
