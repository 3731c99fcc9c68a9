/**
 * In-process stand-ins for the network and the audio device
 */

import type { PlaybackDevice, PlaybackRequest } from "./audio/device";
import { ConnError } from "./errors";
import type { BackoffConfig, ClientConfig } from "./types/config";
import type { RawFrame, Transport, TransportFactory, TransportOptions } from "./ws/transport";

export const FAST_RECONNECTION: BackoffConfig = {
  initialDelayMs: 5,
  maxDelayMs: 20,
  backoffMultiplier: 2,
  jitterMs: 0,
};

export function testConfig(overrides: Partial<ClientConfig> = {}): ClientConfig {
  return {
    username: "alice",
    volume: 0.8,
    serverUrl: "ws://127.0.0.1:8081",
    deathClip: "death.mp3",
    player: "ffplay",
    connectTimeoutMs: 1000,
    reconnection: FAST_RECONNECTION,
    ...overrides,
  };
}

interface Waiter {
  resolve: (frame: RawFrame) => void;
  reject: (error: ConnError) => void;
}

export class FakeTransport implements Transport {
  readonly sent: string[] = [];
  closed = false;
  failSends = false;
  /**
   * Keep sends pending until releaseSends()
   */
  holdSends = false;
  private heldSends: Array<() => void> = [];
  private frames: RawFrame[] = [];
  private waiters: Waiter[] = [];
  private failure: ConnError | null = null;

  constructor(readonly url: string) {}

  /**
   * Deliver a frame from the "server"
   */
  push(frame: RawFrame): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve(frame);
    } else {
      this.frames.push(frame);
    }
  }

  /**
   * Simulate the server or network dropping the connection
   */
  drop(error: ConnError = new ConnError("Connection reset")): void {
    this.fail(error);
  }

  async send(data: string): Promise<void> {
    if (this.failSends || this.failure) {
      throw new ConnError("Send failed");
    }
    if (this.holdSends) {
      await new Promise<void>((resolve) => this.heldSends.push(resolve));
    }
    this.sent.push(data);
  }

  releaseSends(): void {
    const held = this.heldSends;
    this.heldSends = [];
    for (const release of held) release();
  }

  receive(): Promise<RawFrame> {
    const frame = this.frames.shift();
    if (frame !== undefined) return Promise.resolve(frame);
    if (this.failure) return Promise.reject(this.failure);
    return new Promise((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  close(): void {
    this.closed = true;
    this.fail(new ConnError("Transport closed"));
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

/**
 * Transport factory that records every attempt.
 * The first `failures` attempts reject with ConnError.
 */
export class FakeNetwork {
  readonly transports: FakeTransport[] = [];
  readonly attempts: TransportOptions[] = [];
  failures = 0;
  failHandshake = false;
  holdHandshake = false;

  readonly factory: TransportFactory = async (url, options) => {
    this.attempts.push(options);
    if (this.failures > 0) {
      this.failures--;
      throw new ConnError(`Connection refused: ${url}`);
    }
    const transport = new FakeTransport(url);
    transport.failSends = this.failHandshake;
    transport.holdSends = this.holdHandshake;
    this.transports.push(transport);
    return transport;
  };

  get latest(): FakeTransport | undefined {
    return this.transports[this.transports.length - 1];
  }

  /**
   * Transports not yet closed
   */
  get live(): FakeTransport[] {
    return this.transports.filter((transport) => !transport.closed);
  }
}

/**
 * Playback device that records requests. Plays stay pending until finished
 * with finishAll() or released by close().
 */
export class RecordingDevice implements PlaybackDevice {
  readonly requests: PlaybackRequest[] = [];
  opened = false;
  closed = false;
  openError: Error | null = null;
  playError: Error | null = null;
  private pending: Array<() => void> = [];

  async open(): Promise<void> {
    if (this.openError) throw this.openError;
    this.opened = true;
  }

  play(request: PlaybackRequest): Promise<void> {
    this.requests.push(request);
    if (this.playError) return Promise.reject(this.playError);
    return new Promise((resolve) => {
      this.pending.push(resolve);
    });
  }

  get playing(): number {
    return this.pending.length;
  }

  finishAll(): void {
    const pending = this.pending;
    this.pending = [];
    for (const finish of pending) finish();
  }

  async close(): Promise<void> {
    this.closed = true;
    this.finishAll();
  }
}
