/**
 * Server frame decoding
 *
 * Frames look like {"msgType":"gameStatus","statusType":"died"} or
 * {"msgType":"bgm","audioUrl":"https://..."}. Parsing never throws: anything
 * this client does not understand becomes an "unknown" event.
 */

import type { GameEvent } from "../types/events";
import type { RawFrame } from "../ws/transport";

const TYPE_FIELDS = ["msgType", "msg_type", "type_", "type"] as const;
const AUDIO_URL_FIELDS = ["audioUrl", "audio_url"] as const;
const STATUS_FIELDS = ["statusType", "status_type"] as const;

const DEATH: GameEvent = Object.freeze({ kind: "death" });
const ROUND_END: GameEvent = Object.freeze({ kind: "roundEnd" });

type Fields = Record<string, unknown>;

function isFields(value: unknown): value is Fields {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * First string value among the given aliases, in order
 */
function pickString(fields: Fields, aliases: readonly string[]): string | null {
  for (const alias of aliases) {
    const value = fields[alias];
    if (typeof value === "string") return value;
  }
  return null;
}

function unknownEvent(raw: string): GameEvent {
  return Object.freeze({ kind: "unknown", raw });
}

function decodeText(raw: RawFrame): string {
  return typeof raw === "string" ? raw : raw.toString("utf8");
}

/**
 * Decode one inbound frame into a game event
 */
export function parseFrame(raw: RawFrame): GameEvent {
  const text = decodeText(raw);

  let message: unknown;
  try {
    message = JSON.parse(text);
  } catch {
    return unknownEvent(text);
  }
  if (!isFields(message)) return unknownEvent(text);

  switch (pickString(message, TYPE_FIELDS)) {
    case "gameStatus":
      switch (pickString(message, STATUS_FIELDS)) {
        case "died":
          return DEATH;
        case "left":
          return ROUND_END;
        default:
          return unknownEvent(text);
      }

    case "bgm":
      return Object.freeze({
        kind: "roundStart",
        audioUrl: pickString(message, AUDIO_URL_FIELDS),
      });

    default:
      return unknownEvent(text);
  }
}
