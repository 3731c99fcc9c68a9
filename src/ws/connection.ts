/**
 * Connection lifecycle: handshake, reconnection with exponential backoff,
 * and a suspending nextEvent() for the control loop
 */

import { setTimeout as sleep } from "node:timers/promises";
import { ConnError, InvalidConfigError, describeError } from "../errors";
import { createComponentLogger, type Logger } from "../logger";
import type { BackoffConfig } from "../types/config";
import type { ConnectionState, Session } from "../types/events";
import { Backoff } from "./backoff";
import {
  openWebSocketTransport,
  type RawFrame,
  type Transport,
  type TransportFactory,
} from "./transport";

export interface ConnectionCallbacks {
  onStateChange?: (state: ConnectionState) => void;
}

export interface ConnectionManagerOptions {
  reconnection: BackoffConfig;
  connectTimeoutMs: number;
  createTransport?: TransportFactory;
  callbacks?: ConnectionCallbacks;
  /**
   * Aborting this signal closes the manager
   */
  signal?: AbortSignal;
  random?: () => number;
  logger?: Logger;
}

interface Target {
  url: string;
  username: string;
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === "AbortError";
}

export class ConnectionManager {
  private transport: Transport | null = null;
  private target: Target | null = null;
  private currentState: ConnectionState = { status: "disconnected" };
  private readonly backoff: Backoff;
  private readonly closing = new AbortController();
  private readonly createTransport: TransportFactory;
  private readonly callbacks: ConnectionCallbacks;
  private readonly connectTimeoutMs: number;
  private readonly log: Logger;

  constructor(options: ConnectionManagerOptions) {
    this.backoff = new Backoff(options.reconnection, options.random);
    this.createTransport = options.createTransport ?? openWebSocketTransport;
    this.callbacks = options.callbacks ?? {};
    this.connectTimeoutMs = options.connectTimeoutMs;
    this.log = options.logger ?? createComponentLogger("ConnectionManager", "Conn");

    const { signal } = options;
    if (signal?.aborted) {
      this.close();
    } else {
      signal?.addEventListener("abort", () => this.close(), { once: true });
    }
  }

  get state(): ConnectionState {
    return this.currentState;
  }

  get isClosed(): boolean {
    return this.closing.signal.aborted;
  }

  /**
   * Single connection attempt followed by the username handshake
   */
  async connect(url: string, username: string): Promise<Session> {
    const name = username.trim();
    if (name === "") {
      throw new InvalidConfigError("Username is required and must not be empty");
    }
    if (this.isClosed) {
      throw new ConnError("Connection manager is closed");
    }

    this.target = { url, username: name };
    return this.open(this.target);
  }

  /**
   * Wait for the next frame, reconnecting as often as needed.
   * Resolves null once the manager is closed.
   */
  async nextEvent(): Promise<RawFrame | null> {
    if (!this.target) {
      throw new Error("connect() must be called before nextEvent()");
    }

    for (;;) {
      if (this.isClosed) return null;

      if (!this.transport) {
        const reconnected = await this.reconnect(this.target);
        if (!reconnected) return null;
      }

      const transport = this.transport;
      if (!transport) continue;

      try {
        return await transport.receive();
      } catch (error) {
        if (this.isClosed) return null;
        if (!(error instanceof ConnError)) throw error;

        this.log.warn({ error: describeError(error) }, "Lost connection to server, attempting to reconnect");
        this.releaseTransport();
        this.setState({ status: "disconnected" });
      }
    }
  }

  /**
   * Stop reading, cancel any pending backoff and close the live transport. Idempotent.
   */
  close(): void {
    if (this.isClosed) return;
    this.closing.abort();
    this.releaseTransport();
    this.setState({ status: "disconnected" });
    this.log.info("Connection closed");
  }

  private async open(target: Target): Promise<Session> {
    this.releaseTransport();
    this.setState({ status: "connecting", attempt: this.backoff.attempt });

    let transport: Transport;
    try {
      transport = await this.createTransport(target.url, {
        connectTimeoutMs: this.connectTimeoutMs,
        signal: this.closing.signal,
      });
    } catch (error) {
      if (!this.isClosed) this.setState({ status: "disconnected" });
      throw error instanceof ConnError
        ? error
        : new ConnError(`Failed to connect to ${target.url}`, { cause: error });
    }

    if (this.isClosed) {
      transport.close();
      throw new ConnError("Connection manager closed while connecting");
    }

    try {
      await transport.send(target.username);
    } catch (error) {
      transport.close();
      if (!this.isClosed) this.setState({ status: "disconnected" });
      throw error instanceof ConnError
        ? error
        : new ConnError("Failed to send handshake", { cause: error });
    }

    if (this.isClosed) {
      transport.close();
      throw new ConnError("Connection manager closed during handshake");
    }

    this.transport = transport;
    this.backoff.reset();
    this.setState({ status: "connected" });
    this.log.info(
      { url: target.url, username: target.username },
      `Connected to server ${target.url} with username ${target.username}`
    );

    return { url: target.url, username: target.username, connectedAt: new Date() };
  }

  /**
   * Retry until connected; false when cancelled
   */
  private async reconnect(target: Target): Promise<boolean> {
    for (;;) {
      if (this.isClosed) return false;

      const delayMs = this.backoff.next();
      const attempt = this.backoff.attempt;
      this.setState({ status: "backoff", delayMs, attempt });
      this.log.warn(
        { attempt, delayMs },
        `Reconnecting to ${target.url} in ${delayMs}ms (attempt ${attempt})`
      );

      try {
        await sleep(delayMs, undefined, { signal: this.closing.signal });
      } catch (error) {
        if (isAbortError(error)) return false;
        throw error;
      }

      try {
        await this.open(target);
        return true;
      } catch (error) {
        if (this.isClosed) return false;
        if (!(error instanceof ConnError)) throw error;
        this.log.debug({ error: describeError(error), attempt }, "Reconnection attempt failed");
      }
    }
  }

  private releaseTransport(): void {
    if (this.transport) {
      this.transport.close();
      this.transport = null;
    }
  }

  private setState(state: ConnectionState): void {
    this.currentState = state;
    this.callbacks.onStateChange?.(state);
  }
}
