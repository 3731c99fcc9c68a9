/**
 * Runner State Machine
 * Process lifecycle from startup to a clean stop
 */

import { createComponentLogger } from "../logger";

export enum RunnerState {
  STARTING = "STARTING", // Validating config and opening the audio device
  RUNNING = "RUNNING", // Reading events from the server
  SHUTTING_DOWN = "SHUTTING_DOWN", // Closing the connection and releasing audio
  STOPPED = "STOPPED", // Terminal
}

/**
 * Valid state transitions
 *
 * STARTING → RUNNING (audio open)
 * STARTING → STOPPED (fatal startup error)
 * RUNNING → SHUTTING_DOWN (cancellation or loop exit)
 * SHUTTING_DOWN → STOPPED (resources released)
 */
const VALID_TRANSITIONS: Record<RunnerState, RunnerState[]> = {
  [RunnerState.STARTING]: [RunnerState.RUNNING, RunnerState.STOPPED],
  [RunnerState.RUNNING]: [RunnerState.SHUTTING_DOWN],
  [RunnerState.SHUTTING_DOWN]: [RunnerState.STOPPED],
  [RunnerState.STOPPED]: [],
};

export class RunnerStateMachine {
  private state: RunnerState = RunnerState.STARTING;
  private transitionCount = 0;
  private log = createComponentLogger("RunnerStateMachine", "RunnerState");

  constructor(private readonly onTransition?: (state: RunnerState) => void) {
    this.logTransition(RunnerState.STARTING);
  }

  /**
   * Transition to a new state; invalid transitions are logged and ignored
   */
  transitionTo(newState: RunnerState): boolean {
    const validNextStates = VALID_TRANSITIONS[this.state];

    if (!validNextStates.includes(newState)) {
      this.log.error(
        `Invalid transition: ${this.state} → ${newState}. ` +
        `Valid: ${validNextStates.join(", ") || "none"}`
      );
      return false;
    }

    this.state = newState;
    this.logTransition(newState);
    this.onTransition?.(newState);
    return true;
  }

  getState(): RunnerState {
    return this.state;
  }

  is(state: RunnerState): boolean {
    return this.state === state;
  }

  private logTransition(state: RunnerState): void {
    this.transitionCount++;
    this.log.debug(`${state} (#${this.transitionCount})`);
  }
}
