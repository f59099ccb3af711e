import { Spinner } from "@inkjs/ui";
import { Box, Text, useApp, useInput } from "ink";
import { useEffect, useReducer, useState } from "react";
import type { TestResult } from "../runner/types.js";
import {
  failureReason,
  formatDuration,
  formatDurationMs,
  formatFailureLine,
  formatSummaryLine,
} from "../utils/format.js";
import {
  applyMatrixEvent,
  initialMatrixState,
  type MatrixState,
} from "./matrix-state.js";
import type { TUIEvent } from "./matrix-tui-types.js";
import { colors } from "./styles.js";

interface FailureLineProps {
  readonly result: TestResult;
}

const FailureLine = ({ result }: FailureLineProps): JSX.Element => {
  const reason = failureReason(result);
  return (
    <Box flexDirection="column">
      <Text color={colors.error}>{formatFailureLine(result)}</Text>
      {reason && (
        <Box marginLeft={2}>
          <Text color={colors.muted}>{reason}</Text>
        </Box>
      )}
    </Box>
  );
};

interface MatrixTUIProps {
  /**
   * Event stream from the runner
   */
  readonly onEvent: (callback: (event: TUIEvent) => void) => () => void;

  /**
   * Called when user cancels (Ctrl+C)
   */
  readonly onCancel?: () => void;
}

/**
 * Live progress for a matrix run: the job in flight, a running count and
 * every failure as it happens.
 */
export const MatrixTUI = ({ onEvent, onCancel }: MatrixTUIProps): JSX.Element => {
  const { exit } = useApp();
  const [state, dispatch] = useReducer(applyMatrixEvent, initialMatrixState);
  const [elapsed, setElapsed] = useState(0);

  useInput((input, key) => {
    if (key.ctrl && input === "c") {
      onCancel?.();
      exit();
    }
  });

  useEffect(() => {
    const timer = setInterval(() => {
      setElapsed((prev) => prev + 1);
    }, 1000);

    return () => {
      clearInterval(timer);
    };
  }, []);

  useEffect(() => onEvent(dispatch), [onEvent]);

  useEffect(() => {
    if (state.phase !== "done") {
      return;
    }
    // Exit after a brief delay to show final state
    const timer = setTimeout(() => {
      exit();
    }, 100);
    return () => {
      clearTimeout(timer);
    };
  }, [state.phase, exit]);

  return (
    <Box flexDirection="column">
      <Box>
        <Text color={colors.muted}>
          $ matrix · {state.done ? formatDurationMs(state.done.duration) : formatDuration(elapsed)}
        </Text>
      </Box>
      {state.failures.length > 0 && (
        <Box flexDirection="column" marginLeft={2} marginTop={1}>
          {state.failures.map((result, idx) => (
            <FailureLine key={idx} result={result} />
          ))}
        </Box>
      )}
      {renderStatus(state)}
      {state.warnings.length > 0 && (
        <Box flexDirection="column" marginTop={1}>
          {state.warnings.map((warning, idx) => (
            <Text color={colors.muted} key={idx}>
              i {warning}
            </Text>
          ))}
        </Box>
      )}
    </Box>
  );
};

const renderStatus = (state: MatrixState): JSX.Element => {
  if (state.phase === "waiting") {
    return (
      <Box marginLeft={2} marginTop={1}>
        <Spinner label="Loading matrix" />
      </Box>
    );
  }

  if (state.phase === "running") {
    const label = state.current
      ? `${state.current.testName} on ${state.current.compiler}`
      : "Starting";
    return (
      <Box marginLeft={2} marginTop={1}>
        <Spinner label={`${label} · ${state.completed}/${state.total}`} />
      </Box>
    );
  }

  const summary = formatSummaryLine(state.passed, state.total);
  const reusedNote =
    state.reused > 0 ? ` (${state.reused} reused from auto-detection)` : "";

  if (state.done?.aborted) {
    return (
      <Box marginTop={1}>
        <Text bold color={colors.warn}>
          ✗ Cancelled · {summary}
        </Text>
      </Box>
    );
  }

  const allPassed = state.passed === state.total;
  return (
    <Box marginTop={1}>
      <Text bold color={allPassed ? colors.brand : colors.error}>
        {allPassed ? "✓" : "✗"} {summary}
        {reusedNote}
      </Text>
    </Box>
  );
};
