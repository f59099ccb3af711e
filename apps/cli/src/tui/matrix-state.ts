import type { TestResult } from "../runner/types.js";
import type { DoneEvent, TUIEvent } from "./matrix-tui-types.js";

export type MatrixPhase = "waiting" | "running" | "done";

export interface CurrentJob {
  readonly testName: string;
  readonly compiler: string;
}

export interface MatrixState {
  readonly phase: MatrixPhase;
  readonly total: number;
  /**
   * Results that count toward the total.
   */
  readonly completed: number;
  readonly passed: number;
  readonly reused: number;
  readonly current?: CurrentJob;
  /**
   * Jobs that ran and failed, in order.
   */
  readonly failures: readonly TestResult[];
  readonly warnings: readonly string[];
  readonly done?: DoneEvent;
}

export const initialMatrixState: MatrixState = {
  phase: "waiting",
  total: 0,
  completed: 0,
  passed: 0,
  reused: 0,
  failures: [],
  warnings: [],
};

/**
 * Folds one runner event into the progress view's state.
 */
export const applyMatrixEvent = (
  state: MatrixState,
  event: TUIEvent
): MatrixState => {
  switch (event.type) {
    case "start":
      return { ...state, phase: "running", total: event.total };
    case "job":
      return {
        ...state,
        current: { testName: event.testName, compiler: event.compiler },
      };
    case "result": {
      const { result, reused, counted } = event;
      return {
        ...state,
        completed: counted ? state.completed + 1 : state.completed,
        passed: counted && result.passed ? state.passed + 1 : state.passed,
        reused: reused ? state.reused + 1 : state.reused,
        failures:
          reused || result.passed ? state.failures : [...state.failures, result],
      };
    }
    case "warning":
      return { ...state, warnings: [...state.warnings, event.message] };
    case "done":
      return {
        ...state,
        phase: "done",
        current: undefined,
        passed: event.passed,
        total: event.total,
        done: event,
      };
  }
};
