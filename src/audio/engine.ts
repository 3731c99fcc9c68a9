/**
 * Audio engine
 * Owns the playback device; plays are fire-and-forget and may overlap.
 */

import { clampVolume } from "../config";
import { AudioInitError, describeError } from "../errors";
import { createComponentLogger, type Logger } from "../logger";
import type { PlaybackDevice, PlaybackRequest } from "./device";

type EngineState = "closed" | "opening" | "open" | "closing";

export class AudioEngine {
  private state: EngineState = "closed";
  private opening: Promise<void> | null = null;
  private closing: Promise<void> | null = null;
  private readonly inFlight = new Set<Promise<void>>();
  private readonly log: Logger;

  constructor(
    private readonly device: PlaybackDevice,
    logger?: Logger
  ) {
    this.log = logger ?? createComponentLogger("AudioEngine", "Audio");
  }

  get isOpen(): boolean {
    return this.state === "open";
  }

  /**
   * Playbacks started and not yet settled
   */
  get activePlaybacks(): number {
    return this.inFlight.size;
  }

  /**
   * Open the output device. Concurrent callers share one attempt.
   * Any failure surfaces as AudioInitError.
   */
  open(): Promise<void> {
    if (this.state === "open") return Promise.resolve();
    if (this.opening) return this.opening;
    if (this.state === "closing") {
      return Promise.reject(new AudioInitError("Audio engine is closing"));
    }

    this.state = "opening";
    this.opening = this.device
      .open()
      .then(() => {
        this.state = "open";
        this.log.info("Audio device opened");
      })
      .catch((error: unknown) => {
        this.state = "closed";
        throw error instanceof AudioInitError
          ? error
          : new AudioInitError("Failed to open audio device", { cause: error });
      })
      .finally(() => {
        this.opening = null;
      });
    return this.opening;
  }

  /**
   * Start playing a clip without waiting for it to finish.
   * Failures are logged and the cue is skipped.
   */
  play(clip: string, volume: number): void {
    if (this.state !== "open") {
      this.log.warn({ clip, state: this.state }, "Audio engine is not open, skipping cue");
      return;
    }

    const request: PlaybackRequest = { clip, volume: clampVolume(volume) };
    this.log.debug({ clip: request.clip, volume: request.volume }, "Playing clip");

    const task: Promise<void> = this.device
      .play(request)
      .catch((error: unknown) => {
        this.log.error({ clip, error: describeError(error) }, "Playback failed, skipping cue");
      })
      .finally(() => {
        this.inFlight.delete(task);
      });
    this.inFlight.add(task);
  }

  /**
   * Stop accepting plays, release the device and wait for in-flight playbacks to settle
   */
  close(): Promise<void> {
    if (this.closing) return this.closing;
    if (this.state === "closed" && !this.opening) return Promise.resolve();

    this.closing = (async () => {
      if (this.opening) {
        // The open error, if any, already went to the caller of open()
        await Promise.allSettled([this.opening]);
      }
      this.state = "closing";
      try {
        await this.device.close();
      } catch (error) {
        this.log.error({ error: describeError(error) }, "Error releasing audio device");
      }
      await Promise.allSettled([...this.inFlight]);
      this.state = "closed";
      this.log.info("Audio device released");
    })().finally(() => {
      this.closing = null;
    });
    return this.closing;
  }
}
