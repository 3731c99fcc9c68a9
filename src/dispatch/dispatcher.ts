/**
 * Maps game events to audio actions
 */

import { clampVolume } from "../config";
import { createComponentLogger, type Logger } from "../logger";
import type { GameEvent } from "../types/events";

/**
 * The slice of AudioEngine the dispatcher drives
 */
export interface AudioOutput {
  play(clip: string, volume: number): void;
}

export interface DispatchPolicy {
  deathClip: string;
  volume: number;
}

export class EventDispatcher {
  private readonly log: Logger;

  constructor(
    private readonly audio: AudioOutput,
    private readonly policy: Readonly<DispatchPolicy>,
    logger?: Logger
  ) {
    this.log = logger ?? createComponentLogger("EventDispatcher", "Dispatch");
  }

  /**
   * Apply the policy for one event. Keeps no memory between calls.
   */
  dispatch(event: GameEvent): void {
    switch (event.kind) {
      case "death":
        this.log.info("Player died, playing death cue");
        this.audio.play(this.policy.deathClip, clampVolume(this.policy.volume));
        break;

      case "roundStart":
        this.log.debug({ audioUrl: event.audioUrl }, "Round started");
        break;

      case "roundEnd":
        this.log.debug("Round ended");
        break;

      case "unknown":
        this.log.debug({ raw: event.raw }, "Ignoring unrecognized message");
        break;

      default: {
        const unhandled: never = event;
        this.log.warn({ event: unhandled }, "Unhandled event");
      }
    }
  }
}
