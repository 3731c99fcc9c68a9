import { describe, it, expect } from "vitest";
import { parseFrame } from "./parser";

describe("parseFrame", () => {
  it("decodes a died status as a death", () => {
    expect(parseFrame('{"msgType":"gameStatus","statusType":"died"}')).toEqual({ kind: "death" });
  });

  it("accepts the snake_case field aliases", () => {
    expect(parseFrame('{"msg_type":"gameStatus","status_type":"died"}')).toEqual({ kind: "death" });
    expect(parseFrame('{"type":"gameStatus","statusType":"died"}')).toEqual({ kind: "death" });
    expect(parseFrame('{"type_":"gameStatus","statusType":"died"}')).toEqual({ kind: "death" });
    expect(parseFrame('{"type_":"bgm","audioUrl":"https://cdn.example.test/map.mp3"}')).toEqual({
      kind: "roundStart",
      audioUrl: "https://cdn.example.test/map.mp3",
    });
  });

  it("decodes binary frames as UTF-8 text", () => {
    const frame = Buffer.from('{"msgType":"gameStatus","statusType":"died"}', "utf8");
    expect(parseFrame(frame)).toEqual({ kind: "death" });
  });

  it("decodes a left status as round end", () => {
    expect(parseFrame('{"msgType":"gameStatus","statusType":"left"}')).toEqual({ kind: "roundEnd" });
  });

  it("decodes bgm as round start with its audio url", () => {
    expect(parseFrame('{"msgType":"bgm","audioUrl":"https://cdn.example.test/map.mp3"}')).toEqual({
      kind: "roundStart",
      audioUrl: "https://cdn.example.test/map.mp3",
    });
    expect(parseFrame('{"msgType":"bgm"}')).toEqual({ kind: "roundStart", audioUrl: null });
    expect(parseFrame('{"msgType":"bgm","audioUrl":42}')).toEqual({ kind: "roundStart", audioUrl: null });
  });

  it("ignores extra fields", () => {
    expect(parseFrame('{"msgType":"gameStatus","statusType":"died","map":"Lost Woods"}')).toEqual({
      kind: "death",
    });
  });

  it("maps malformed input to unknown with the raw text", () => {
    expect(parseFrame("not json")).toEqual({ kind: "unknown", raw: "not json" });
    expect(parseFrame("")).toEqual({ kind: "unknown", raw: "" });
    expect(parseFrame("[1,2,3]")).toEqual({ kind: "unknown", raw: "[1,2,3]" });
    expect(parseFrame("null")).toEqual({ kind: "unknown", raw: "null" });
    expect(parseFrame('"died"')).toEqual({ kind: "unknown", raw: '"died"' });
  });

  it("maps unrecognised shapes to unknown", () => {
    const frames = [
      '{"msgType":"chat","text":"hi"}',
      '{"msgType":"gameStatus"}',
      '{"msgType":"gameStatus","statusType":"survived"}',
      '{"msgType":7,"statusType":"died"}',
      '{"statusType":"died"}',
      '{"died":true}',
    ];
    for (const frame of frames) {
      expect(parseFrame(frame)).toEqual({ kind: "unknown", raw: frame });
    }
  });

  it("is pure: the same bytes always yield the same event", () => {
    const frames = [
      '{"msgType":"gameStatus","statusType":"died"}',
      '{"msgType":"bgm","audioUrl":"https://cdn.example.test/a.mp3"}',
      "garbage",
    ];
    for (const frame of frames) {
      expect(parseFrame(frame)).toEqual(parseFrame(frame));
      expect(parseFrame(Buffer.from(frame))).toEqual(parseFrame(frame));
    }
  });

  it("never reports a death for payloads without the death indicator", () => {
    const frames = [
      '{"msgType":"gameStatus","statusType":"Died"}',
      '{"msgType":"gamestatus","statusType":"died"}',
      '{"msgType":"bgm","statusType":"died"}',
      '{"msgType":"gameStatus","statusType":["died"]}',
      "died",
    ];
    for (const frame of frames) {
      expect(parseFrame(frame).kind).not.toBe("death");
    }
  });

  it("returns frozen events", () => {
    expect(Object.isFrozen(parseFrame('{"msgType":"gameStatus","statusType":"died"}'))).toBe(true);
    expect(Object.isFrozen(parseFrame("x"))).toBe(true);
  });
});
