import { describe, it, expect, vi } from "vitest";
import { AudioInitError, PlaybackError } from "../errors";
import { RecordingDevice } from "../test-utils";
import { AudioEngine } from "./engine";

describe("AudioEngine", () => {
  it("opens the device once for concurrent callers", async () => {
    const device = new RecordingDevice();
    const open = vi.spyOn(device, "open");
    const engine = new AudioEngine(device);

    await Promise.all([engine.open(), engine.open()]);
    await engine.open();

    expect(open).toHaveBeenCalledTimes(1);
    expect(engine.isOpen).toBe(true);
  });

  it("wraps device failures in AudioInitError", async () => {
    const device = new RecordingDevice();
    device.openError = new Error("no output device");
    const engine = new AudioEngine(device);

    const opening = engine.open();
    await expect(opening).rejects.toBeInstanceOf(AudioInitError);
    await expect(opening).rejects.toThrow("Failed to open audio device");
    expect(engine.isOpen).toBe(false);
  });

  it("passes AudioInitError through unchanged", async () => {
    const device = new RecordingDevice();
    device.openError = new AudioInitError('Audio player "ffplay" is not available');
    const engine = new AudioEngine(device);

    await expect(engine.open()).rejects.toThrow('Audio player "ffplay" is not available');
  });

  it("returns from play without waiting for playback", async () => {
    const device = new RecordingDevice();
    const engine = new AudioEngine(device);
    await engine.open();

    engine.play("death.mp3", 0.8);

    expect(device.requests).toEqual([{ clip: "death.mp3", volume: 0.8 }]);
    expect(engine.activePlaybacks).toBe(1);
    device.finishAll();
    await vi.waitFor(() => expect(engine.activePlaybacks).toBe(0));
  });

  it("starts an independent playback for every overlapping call", async () => {
    const device = new RecordingDevice();
    const engine = new AudioEngine(device);
    await engine.open();

    for (let i = 0; i < 5; i++) engine.play("death.mp3", 0.5);

    expect(device.requests).toHaveLength(5);
    expect(device.playing).toBe(5);
    expect(engine.activePlaybacks).toBe(5);
  });

  it("clamps the volume before it reaches the device", async () => {
    const device = new RecordingDevice();
    const engine = new AudioEngine(device);
    await engine.open();

    engine.play("a.mp3", 7);
    engine.play("b.mp3", -1);

    expect(device.requests.map((request) => request.volume)).toEqual([1, 0]);
  });

  it("logs and skips a failed playback", async () => {
    const device = new RecordingDevice();
    device.playError = new PlaybackError("ffplay exited with 1 while playing death.mp3");
    const engine = new AudioEngine(device);
    await engine.open();

    engine.play("death.mp3", 0.5);
    await vi.waitFor(() => expect(engine.activePlaybacks).toBe(0));

    device.playError = null;
    engine.play("death.mp3", 0.5);
    expect(device.requests).toHaveLength(2);
  });

  it("skips plays while not open", () => {
    const device = new RecordingDevice();
    const engine = new AudioEngine(device);

    engine.play("death.mp3", 0.5);

    expect(device.requests).toHaveLength(0);
  });

  it("releases the device and drains in-flight playbacks on close", async () => {
    const device = new RecordingDevice();
    const engine = new AudioEngine(device);
    await engine.open();
    engine.play("death.mp3", 0.5);
    engine.play("death.mp3", 0.5);

    await engine.close();

    expect(device.closed).toBe(true);
    expect(engine.activePlaybacks).toBe(0);
    expect(engine.isOpen).toBe(false);

    engine.play("death.mp3", 0.5);
    expect(device.requests).toHaveLength(2);
  });

  it("shares one close between concurrent callers", async () => {
    const device = new RecordingDevice();
    const close = vi.spyOn(device, "close");
    const engine = new AudioEngine(device);
    await engine.open();

    await Promise.all([engine.close(), engine.close()]);
    await engine.close();

    expect(close).toHaveBeenCalledTimes(1);
  });
});
