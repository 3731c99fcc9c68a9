/**
 * Game event and connection state types
 */

/**
 * Decoded server notification. Immutable once parsed.
 */
export type GameEvent =
  | { readonly kind: "death" }
  | { readonly kind: "roundStart"; readonly audioUrl: string | null }
  | { readonly kind: "roundEnd" }
  | { readonly kind: "unknown"; readonly raw: string };

/**
 * Connection lifecycle, exactly one of which is current at any time
 */
export type ConnectionState =
  | { readonly status: "disconnected" }
  | { readonly status: "connecting"; readonly attempt: number }
  | { readonly status: "connected" }
  | { readonly status: "backoff"; readonly delayMs: number; readonly attempt: number };

/**
 * Established connection, returned once the handshake has been sent
 */
export interface Session {
  readonly url: string;
  readonly username: string;
  readonly connectedAt: Date;
}
