/**
 * Error taxonomy for the client
 *
 * InvalidConfigError and AudioInitError are fatal and only raised before the
 * client starts running. ConnError and PlaybackError are recoverable and are
 * absorbed by ConnectionManager and AudioEngine respectively.
 */

export class ClientError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidConfigError extends ClientError {}

export class AudioInitError extends ClientError {}

export class ConnError extends ClientError {}

export class PlaybackError extends ClientError {}

/**
 * Render an unknown thrown value as a message, keeping the cause chain short
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    const cause = error.cause instanceof Error ? `: ${error.cause.message}` : "";
    return `${error.message}${cause}`;
  }
  return String(error);
}
