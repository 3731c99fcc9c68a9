import { describe, it, expect, vi } from "vitest";
import { RunnerState, RunnerStateMachine } from "./state";

describe("RunnerStateMachine", () => {
  it("starts in STARTING", () => {
    expect(new RunnerStateMachine().getState()).toBe(RunnerState.STARTING);
  });

  it("follows the normal lifecycle", () => {
    const onTransition = vi.fn();
    const machine = new RunnerStateMachine(onTransition);

    expect(machine.transitionTo(RunnerState.RUNNING)).toBe(true);
    expect(machine.transitionTo(RunnerState.SHUTTING_DOWN)).toBe(true);
    expect(machine.transitionTo(RunnerState.STOPPED)).toBe(true);

    expect(machine.is(RunnerState.STOPPED)).toBe(true);
    expect(onTransition.mock.calls).toEqual([
      [RunnerState.RUNNING],
      [RunnerState.SHUTTING_DOWN],
      [RunnerState.STOPPED],
    ]);
  });

  it("allows a fatal startup to stop directly", () => {
    const machine = new RunnerStateMachine();
    expect(machine.transitionTo(RunnerState.STOPPED)).toBe(true);
  });

  it("ignores invalid transitions", () => {
    const onTransition = vi.fn();
    const machine = new RunnerStateMachine(onTransition);

    expect(machine.transitionTo(RunnerState.SHUTTING_DOWN)).toBe(false);
    expect(machine.getState()).toBe(RunnerState.STARTING);

    machine.transitionTo(RunnerState.STOPPED);
    expect(machine.transitionTo(RunnerState.RUNNING)).toBe(false);
    expect(machine.getState()).toBe(RunnerState.STOPPED);
    expect(onTransition).toHaveBeenCalledTimes(1);
  });
});
