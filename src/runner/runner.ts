/**
 * Runner
 * Composes audio, connection, parser and dispatcher into one control loop:
 * nextEvent() → parseFrame() → dispatch(), until cancelled.
 */

import { AudioEngine } from "../audio/engine";
import type { PlaybackDevice } from "../audio/device";
import { assertValidConfig } from "../config";
import { EventDispatcher } from "../dispatch/dispatcher";
import { ConnError, describeError } from "../errors";
import { createComponentLogger, type Logger } from "../logger";
import { parseFrame } from "../protocol/parser";
import type { ClientConfig } from "../types/config";
import type { ConnectionState } from "../types/events";
import { ConnectionManager } from "../ws/connection";
import type { TransportFactory } from "../ws/transport";
import { RunnerState, RunnerStateMachine } from "./state";

export interface RunnerDependencies {
  device: PlaybackDevice;
  createTransport?: TransportFactory;
  random?: () => number;
  onStateChange?: (state: RunnerState) => void;
  onConnectionStateChange?: (state: ConnectionState) => void;
}

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;

function describeConnectionState(state: ConnectionState): string {
  switch (state.status) {
    case "backoff":
      return `backoff ${state.delayMs}ms (attempt ${state.attempt})`;
    case "connecting":
      return `connecting (attempt ${state.attempt})`;
    default:
      return state.status;
  }
}

export class Runner {
  private readonly stateMachine: RunnerStateMachine;
  private readonly cancellation = new AbortController();
  private readonly audio: AudioEngine;
  private readonly log: Logger = createComponentLogger("Runner");

  constructor(
    private readonly config: ClientConfig,
    private readonly deps: RunnerDependencies
  ) {
    this.stateMachine = new RunnerStateMachine(deps.onStateChange);
    this.audio = new AudioEngine(deps.device);
  }

  getState(): RunnerState {
    return this.stateMachine.getState();
  }

  /**
   * Request a cooperative shutdown. Safe to call at any time, more than once.
   */
  shutdown(reason: string): void {
    if (this.cancellation.signal.aborted) return;
    this.log.warn(`Received ${reason}, shutting down`);
    this.cancellation.abort();
  }

  /**
   * Run until shutdown; resolves the process exit code
   */
  async run(): Promise<number> {
    try {
      assertValidConfig(this.config);
      await this.audio.open();
    } catch (error) {
      this.log.error({ error: describeError(error) }, "Startup failed");
      this.stateMachine.transitionTo(RunnerState.STOPPED);
      return EXIT_FAILURE;
    }

    this.stateMachine.transitionTo(RunnerState.RUNNING);

    const connection = new ConnectionManager({
      reconnection: this.config.reconnection,
      connectTimeoutMs: this.config.connectTimeoutMs,
      createTransport: this.deps.createTransport,
      random: this.deps.random,
      signal: this.cancellation.signal,
      callbacks: {
        onStateChange: (state) => {
          this.log.debug(`Connection ${describeConnectionState(state)}`);
          this.deps.onConnectionStateChange?.(state);
        },
      },
    });
    const dispatcher = new EventDispatcher(this.audio, {
      deathClip: this.config.deathClip,
      volume: this.config.volume,
    });

    let exitCode = EXIT_OK;
    try {
      await this.loop(connection, dispatcher);
    } catch (error) {
      this.log.error({ error: describeError(error) }, "Unexpected error in event loop");
      exitCode = EXIT_FAILURE;
    }

    this.stateMachine.transitionTo(RunnerState.SHUTTING_DOWN);
    connection.close();
    await this.audio.close();
    this.stateMachine.transitionTo(RunnerState.STOPPED);
    this.log.info("Stopped");
    return exitCode;
  }

  private async loop(connection: ConnectionManager, dispatcher: EventDispatcher): Promise<void> {
    const { signal } = this.cancellation;
    if (signal.aborted) return;

    try {
      await connection.connect(this.config.serverUrl, this.config.username);
    } catch (error) {
      if (!(error instanceof ConnError)) throw error;
      this.log.warn(
        { error: describeError(error) },
        `Failed to connect to server ${this.config.serverUrl}, retrying`
      );
    }

    while (!signal.aborted) {
      const frame = await connection.nextEvent();
      if (frame === null) break;
      dispatcher.dispatch(parseFrame(frame));
    }
  }
}
