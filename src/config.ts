/**
 * Configuration loading for the client
 * Positional arguments follow the original command surface:
 *   deathcue <username> [volume] [server_url]
 */

import { parseArgs } from "node:util";
import { InvalidConfigError } from "./errors";
import type { BackoffConfig, ClientConfig, PlayerName } from "./types/config";

export const DEFAULT_VOLUME = 0.5;
export const DEFAULT_SERVER_URL = "ws://client.fe2.io:8081";
export const DEFAULT_DEATH_CLIP = "death.mp3";
export const DEFAULT_PLAYER: PlayerName = "ffplay";
export const DEFAULT_CONNECT_TIMEOUT_MS = 15000;

export const DEFAULT_RECONNECTION: BackoffConfig = {
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
  jitterMs: 500, // Random jitter to prevent thundering herd
};

const PLAYERS: readonly PlayerName[] = ["ffplay", "mpv"];

export const USAGE = `Usage: deathcue <username> [volume] [server_url] [options]

Arguments:
  username              Roblox username to track (required)
  volume                Volume of the death sound, 0.0-1.0 (default ${DEFAULT_VOLUME})
  server_url            WebSocket server URL (default ${DEFAULT_SERVER_URL})

Options:
  -v, --volume <n>      Same as the volume argument
  -u, --url <url>       Same as the server_url argument
      --clip <path>     Sound file or URL played on death (env DEATH_CLIP, default ${DEFAULT_DEATH_CLIP})
      --player <name>   External player: ${PLAYERS.join(", ")} (env AUDIO_PLAYER, default ${DEFAULT_PLAYER})
      --delay <s>       Initial reconnection delay in seconds (default ${DEFAULT_RECONNECTION.initialDelayMs / 1000})
      --max-delay <s>   Maximum reconnection delay in seconds (default ${DEFAULT_RECONNECTION.maxDelayMs / 1000})
      --backoff <n>     Reconnection delay multiplier (default ${DEFAULT_RECONNECTION.backoffMultiplier})
      --jitter <ms>     Maximum random jitter added to each delay (default ${DEFAULT_RECONNECTION.jitterMs})
      --connect-timeout <s>
                        Seconds to wait for the server to accept a connection (default ${DEFAULT_CONNECT_TIMEOUT_MS / 1000})
  -h, --help            Show this message`;

/**
 * Result of reading the command line: either a usable config or a help request
 */
export type LoadResult = { kind: "config"; config: ClientConfig } | { kind: "help" };

/**
 * Clamp a linear volume into [0, 1]; NaN is treated as silence
 */
export function clampVolume(volume: number): number {
  if (Number.isNaN(volume)) return 0;
  return Math.min(1, Math.max(0, volume));
}

function parseNumber(name: string, raw: string): number {
  const value = Number(raw.trim());
  if (raw.trim() === "" || !Number.isFinite(value)) {
    throw new InvalidConfigError(`Invalid ${name}: "${raw}" is not a number`);
  }
  return value;
}

function parseServerUrl(raw: string): string {
  let url: URL;
  try {
    url = new URL(raw);
  } catch (error) {
    throw new InvalidConfigError(`Invalid server URL: "${raw}"`, { cause: error });
  }
  if (url.protocol !== "ws:" && url.protocol !== "wss:") {
    throw new InvalidConfigError(
      `Invalid server URL: "${raw}" must use ws:// or wss://`
    );
  }
  return raw;
}

function parsePlayer(raw: string): PlayerName {
  const player = PLAYERS.find((name) => name === raw);
  if (!player) {
    throw new InvalidConfigError(
      `Unknown player "${raw}". Expected one of: ${PLAYERS.join(", ")}`
    );
  }
  return player;
}

const NEGATIVE_NUMBER = /^-(\d+\.?\d*|\.\d+)$/;

/**
 * parseArgs reads "-0.5" as a group of short flags. A leading space keeps a
 * negative number a plain value; the value parsers trim it off again.
 */
function protectNegativeNumbers(argv: readonly string[]): string[] {
  return argv.map((arg) => (NEGATIVE_NUMBER.test(arg) ? ` ${arg}` : arg));
}

function parseCommandLine(argv: readonly string[]) {
  try {
    return parseArgs({
      args: protectNegativeNumbers(argv),
      allowPositionals: true,
      strict: true,
      options: {
        volume: { type: "string", short: "v" },
        url: { type: "string", short: "u" },
        clip: { type: "string" },
        player: { type: "string" },
        delay: { type: "string" },
        "max-delay": { type: "string" },
        backoff: { type: "string" },
        jitter: { type: "string" },
        "connect-timeout": { type: "string" },
        help: { type: "boolean", short: "h" },
      },
    });
  } catch (error) {
    throw new InvalidConfigError(
      error instanceof Error ? error.message : "Invalid arguments",
      { cause: error }
    );
  }
}

/**
 * Check the invariants a config must hold before the client starts.
 * Throws InvalidConfigError naming the first violation.
 */
export function assertValidConfig(config: ClientConfig): void {
  if (config.username.trim() === "") {
    throw new InvalidConfigError("Username is required and must not be empty");
  }
  if (!(config.volume >= 0 && config.volume <= 1)) {
    throw new InvalidConfigError(`Volume ${config.volume} is outside [0, 1]`);
  }
  parseServerUrl(config.serverUrl);
  if (config.deathClip.trim() === "") {
    throw new InvalidConfigError("Death clip must not be empty");
  }
  if (config.connectTimeoutMs <= 0) {
    throw new InvalidConfigError("Connect timeout must be positive");
  }

  const { initialDelayMs, maxDelayMs, backoffMultiplier, jitterMs } = config.reconnection;
  if (initialDelayMs <= 0) {
    throw new InvalidConfigError("Reconnection delay must be positive");
  }
  if (maxDelayMs < initialDelayMs) {
    throw new InvalidConfigError(
      `Maximum reconnection delay (${maxDelayMs}ms) is below the initial delay (${initialDelayMs}ms)`
    );
  }
  if (backoffMultiplier < 1) {
    throw new InvalidConfigError("Backoff multiplier must be at least 1");
  }
  if (jitterMs < 0) {
    throw new InvalidConfigError("Jitter must not be negative");
  }
}

/**
 * Build the client configuration from command-line arguments and environment.
 * Pure: reads nothing but its inputs.
 */
export function loadConfig(
  argv: readonly string[],
  env: Readonly<Record<string, string | undefined>>
): LoadResult {
  const { values, positionals } = parseCommandLine(argv);
  if (values.help) {
    return { kind: "help" };
  }

  if (positionals.length > 3) {
    throw new InvalidConfigError(
      `Unexpected argument "${positionals[3]}"`
    );
  }

  const [usernameArg, volumeArg, urlArg] = positionals;
  const username = (usernameArg ?? "").trim();
  if (username === "") {
    throw new InvalidConfigError("Username is required and must not be empty");
  }

  const rawVolume = volumeArg ?? values.volume;
  const volume = clampVolume(
    rawVolume === undefined ? DEFAULT_VOLUME : parseNumber("volume", rawVolume)
  );

  const serverUrl = parseServerUrl(urlArg ?? values.url ?? DEFAULT_SERVER_URL);
  const deathClip = values.clip ?? env.DEATH_CLIP ?? DEFAULT_DEATH_CLIP;
  const player = parsePlayer(values.player ?? env.AUDIO_PLAYER ?? DEFAULT_PLAYER);

  const seconds = (name: string, raw: string | undefined, fallbackMs: number): number =>
    raw === undefined ? fallbackMs : Math.round(parseNumber(name, raw) * 1000);

  const config: ClientConfig = {
    username,
    volume,
    serverUrl,
    deathClip,
    player,
    connectTimeoutMs: seconds(
      "connect timeout",
      values["connect-timeout"],
      DEFAULT_CONNECT_TIMEOUT_MS
    ),
    reconnection: {
      initialDelayMs: seconds("delay", values.delay, DEFAULT_RECONNECTION.initialDelayMs),
      maxDelayMs: seconds("max delay", values["max-delay"], DEFAULT_RECONNECTION.maxDelayMs),
      backoffMultiplier:
        values.backoff === undefined
          ? DEFAULT_RECONNECTION.backoffMultiplier
          : parseNumber("backoff", values.backoff),
      jitterMs:
        values.jitter === undefined
          ? DEFAULT_RECONNECTION.jitterMs
          : parseNumber("jitter", values.jitter),
    },
  };

  assertValidConfig(config);
  return { kind: "config", config };
}
