import type { TestResult } from "../runner/types.js";

/**
 * Emitted once the matrix is known.
 */
export interface StartEvent {
  readonly type: "start";
  readonly total: number;
  readonly tests: number;
  readonly compilers: number;
}

/**
 * A job is about to run.
 */
export interface JobEvent {
  readonly type: "job";
  readonly testName: string;
  readonly compiler: string;
}

export interface ResultEvent {
  readonly type: "result";
  readonly result: TestResult;
  /**
   * Copied from an auto variant instead of run.
   */
  readonly reused: boolean;
  /**
   * Counts toward the progress total.
   */
  readonly counted: boolean;
}

export interface WarningEvent {
  readonly type: "warning";
  readonly message: string;
}

export interface DoneEvent {
  readonly type: "done";
  readonly passed: number;
  readonly total: number;
  readonly duration: number;
  readonly aborted: boolean;
}

export type TUIEvent =
  | StartEvent
  | JobEvent
  | ResultEvent
  | WarningEvent
  | DoneEvent;
