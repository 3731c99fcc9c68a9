/**
 * Configuration type definitions for the client
 */

/**
 * Reconnection schedule
 */
export interface BackoffConfig {
  initialDelayMs: number; // Delay before the first reconnection attempt
  maxDelayMs: number; // Delays never grow past this cap
  backoffMultiplier: number; // Growth factor per attempt
  jitterMs: number; // Upper bound of the random delay added to each wait
}

/**
 * External players the playback device knows how to drive
 */
export type PlayerName = "ffplay" | "mpv";

/**
 * Complete client configuration, read-only once loaded
 */
export interface ClientConfig {
  readonly username: string;
  readonly volume: number; // Linear volume, always within [0, 1]
  readonly serverUrl: string;
  readonly deathClip: string; // File path or URL handed to the player
  readonly player: PlayerName;
  readonly connectTimeoutMs: number;
  readonly reconnection: Readonly<BackoffConfig>;
}
