/**
 * Playback device backed by an external player process
 * Each clip runs in its own child process, so overlapping plays are independent.
 */

import { spawn, type ChildProcess } from "node:child_process";
import { access, constants } from "node:fs/promises";
import { AudioInitError, PlaybackError } from "../errors";
import type { PlayerName } from "../types/config";

/**
 * One clip to play at a linear volume in [0, 1]
 */
export interface PlaybackRequest {
  readonly clip: string;
  readonly volume: number;
}

/**
 * Audio output capability consumed by AudioEngine
 */
export interface PlaybackDevice {
  open(): Promise<void>;
  /**
   * Resolve once the clip has finished playing
   */
  play(request: PlaybackRequest): Promise<void>;
  /**
   * Stop whatever is playing and release the device
   */
  close(): Promise<void>;
}

interface PlayerCommand {
  probe: readonly string[];
  args: (request: PlaybackRequest) => string[];
}

const PLAYER_COMMANDS: Record<PlayerName, PlayerCommand> = {
  ffplay: {
    probe: ["-version"],
    args: ({ clip, volume }) => [
      "-nodisp",
      "-autoexit",
      "-loglevel",
      "error",
      "-volume",
      String(Math.round(volume * 100)),
      clip,
    ],
  },
  mpv: {
    probe: ["--version"],
    args: ({ clip, volume }) => [
      "--no-video",
      "--really-quiet",
      `--volume=${Math.round(volume * 100)}`,
      clip,
    ],
  },
};

/**
 * Command-line arguments for playing a request with the given player
 */
export function playerArgs(player: PlayerName, request: PlaybackRequest): string[] {
  return PLAYER_COMMANDS[player].args(request);
}

interface Exit {
  code: number | null;
  signal: NodeJS.Signals | null;
}

function waitForExit(child: ChildProcess): Promise<Exit> {
  return new Promise((resolve, reject) => {
    child.once("error", reject);
    child.once("exit", (code, signal) => resolve({ code, signal }));
  });
}

export interface ProcessPlaybackOptions {
  player: PlayerName;
  /**
   * Executable and leading arguments; defaults to the player name on PATH
   */
  command?: readonly string[];
  /**
   * Clips that must be readable before the device counts as open.
   * URLs are left to the player.
   */
  requiredClips?: readonly string[];
}

function isRemoteClip(clip: string): boolean {
  return /^[a-z][a-z0-9+.-]+:\/\//i.test(clip);
}

export class ProcessPlaybackDevice implements PlaybackDevice {
  private readonly children = new Map<ChildProcess, Promise<Exit>>();
  private readonly stopped = new WeakSet<ChildProcess>();
  private readonly player: PlayerName;
  private readonly executable: string;
  private readonly leadingArgs: readonly string[];
  private readonly requiredClips: readonly string[];

  constructor(options: ProcessPlaybackOptions) {
    this.player = options.player;
    this.executable = options.command?.[0] ?? options.player;
    this.leadingArgs = options.command?.slice(1) ?? [];
    this.requiredClips = options.requiredClips ?? [];
  }

  async open(): Promise<void> {
    await this.probe();

    for (const clip of this.requiredClips) {
      if (isRemoteClip(clip)) continue;
      try {
        await access(clip, constants.R_OK);
      } catch (error) {
        throw new AudioInitError(`Sound file "${clip}" is not readable`, { cause: error });
      }
    }
  }

  private async probe(): Promise<void> {
    const probe = this.launch(PLAYER_COMMANDS[this.player].probe);

    let exit: Exit;
    try {
      exit = await waitForExit(probe);
    } catch (error) {
      throw new AudioInitError(`Audio player "${this.player}" is not available`, { cause: error });
    }
    if (exit.code !== 0) {
      throw new AudioInitError(
        `Audio player "${this.player}" failed its version check (exit code ${exit.code})`
      );
    }
  }

  async play(request: PlaybackRequest): Promise<void> {
    const child = this.launch(playerArgs(this.player, request));
    const exited = waitForExit(child);
    this.children.set(child, exited);

    let exit: Exit;
    try {
      exit = await exited;
    } catch (error) {
      throw new PlaybackError(`Could not start ${this.player} for ${request.clip}`, { cause: error });
    } finally {
      this.children.delete(child);
    }

    if (exit.code !== 0 && !this.stopped.has(child)) {
      throw new PlaybackError(
        `${this.player} exited with ${exit.code ?? exit.signal} while playing ${request.clip}`
      );
    }
  }

  async close(): Promise<void> {
    const running = [...this.children.entries()];
    for (const [child] of running) {
      this.stopped.add(child);
      child.kill("SIGTERM");
    }
    await Promise.allSettled(running.map(([, exited]) => exited));
  }

  private launch(args: readonly string[]): ChildProcess {
    return spawn(this.executable, [...this.leadingArgs, ...args], { stdio: "ignore" });
  }
}
