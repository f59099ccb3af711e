import { join } from "node:path";
import { ExplorerClient, resolveApiUrl } from "@macrobench/explorer";
import { defineCommand } from "citty";
import { render } from "ink";
import { loadConfig, type MatrixConfig } from "../config/index.js";
import { writeTable } from "../report/index.js";
import {
  DEBUG_LOG_FILE,
  prepareResultsDir,
  writeSummary,
} from "../runner/artifacts.js";
import { MatrixEventEmitter } from "../runner/event-emitter.js";
import { MatrixRunner } from "../runner/index.js";
import { JobRunner } from "../runner/job.js";
import { ResponseRecorder } from "../runner/recorder.js";
import { selectMatrix } from "../runner/selection.js";
import type { RunSummary } from "../runner/types.js";
import { printHeader } from "../tui/components/header.js";
import { MatrixTUI } from "../tui/matrix-tui.js";
import type { TUIEvent } from "../tui/matrix-tui-types.js";
import { shouldUseTUI } from "../tui/render.js";
import { DebugLogger } from "../utils/debug-logger.js";
import { formatError } from "../utils/error.js";
import {
  failureReason,
  formatFailureLine,
  formatJobLabel,
  formatSummaryLine,
} from "../utils/format.js";
import { handleInterrupts, SIGINT_EXIT_CODE } from "../utils/signal.js";
import { type RunOptions, resolveRunOptions } from "./run-options.js";

/**
 * Plain progress output: one line per failure, plus every job and reuse in
 * verbose mode.
 */
const createLinePrinter =
  (verbose: boolean) =>
  (event: TUIEvent): void => {
    switch (event.type) {
      case "job":
        if (verbose) {
          console.log(`→ ${event.testName} on ${event.compiler}`);
        }
        break;
      case "result": {
        const { result, reused } = event;
        if (reused) {
          if (verbose) {
            console.log(`  ${formatJobLabel(result)}: reused from auto-detection`);
          }
        } else if (!result.passed) {
          console.log(formatFailureLine(result));
          const reason = verbose ? failureReason(result) : undefined;
          if (reason) {
            console.log(`  ${reason}`);
          }
        }
        break;
      }
      case "warning":
        console.warn(`Warning: ${event.message}`);
        break;
      default:
        break;
    }
  };

const runPlain = async (
  runner: MatrixRunner,
  eventEmitter: MatrixEventEmitter,
  selection: Pick<MatrixConfig, "compilers" | "tests">,
  verbose: boolean
): Promise<RunSummary> => {
  const interrupts = handleInterrupts(() => {
    console.log("\nCancelling after the current job...");
    runner.abort();
  });

  const unsubscribe = eventEmitter.on(createLinePrinter(verbose));
  try {
    return await runner.run(selection.tests, selection.compilers);
  } finally {
    unsubscribe();
    interrupts.cleanup();
  }
};

const runTUI = async (
  runner: MatrixRunner,
  eventEmitter: MatrixEventEmitter,
  selection: Pick<MatrixConfig, "compilers" | "tests">
): Promise<RunSummary> => {
  printHeader("run");

  const interrupts = handleInterrupts(() => {
    runner.abort();
  });

  const { waitUntilExit } = render(
    <MatrixTUI
      onCancel={() => {
        runner.abort();
      }}
      onEvent={(callback) => eventEmitter.on(callback)}
    />,
    {
      // Ctrl+C aborts the runner; the TUI exits once the runner is done.
      exitOnCtrlC: false,
    }
  );

  try {
    const [summary] = await Promise.all([
      runner.run(selection.tests, selection.compilers),
      waitUntilExit(),
    ]);
    return summary;
  } finally {
    interrupts.cleanup();
  }
};

const execute = async (
  options: RunOptions,
  config: MatrixConfig
): Promise<number> => {
  const selected = selectMatrix(config, {
    compilers: options.compilers,
    tests: options.tests,
    groups: options.groups,
    runAll: options.runAll,
  });
  if (!selected.success) {
    console.error(`Error: ${selected.error}`);
    return 1;
  }
  const selection = selected.value;

  await prepareResultsDir(options.resultsDir);

  const apiUrl = resolveApiUrl(config.settings.apiUrl);
  const logger = new DebugLogger(join(options.resultsDir, DEBUG_LOG_FILE));
  logger.logHeader({
    configPath: options.configPath,
    resultsDir: options.resultsDir,
    apiUrl,
    language: options.language,
    delayMs: options.delayMs,
    runAll: options.runAll,
    preprocessOnly: options.preprocessOnly,
    compilers: selection.compilers.length,
    tests: selection.tests.length,
  });
  logger.logEnvironment();

  const recorder = new ResponseRecorder();
  const service = new ExplorerClient({
    baseUrl: apiUrl,
    log: (message) => logger.logPhase("API", message),
    onResponse: options.debug ? (_compilerId, body) => recorder.record(body) : undefined,
  });

  const eventEmitter = new MatrixEventEmitter();
  const executor = new JobRunner({
    service,
    config: {
      resultsDir: options.resultsDir,
      language: options.language,
      delayMs: options.delayMs,
      debug: options.debug,
      preprocessOnly: options.preprocessOnly,
      runAll: options.runAll,
      verbose: options.verbose,
    },
    logger,
    recorder,
    onWarning: (message) => eventEmitter.emit({ type: "warning", message }),
  });
  const runner = new MatrixRunner({
    executor,
    runAll: options.runAll,
    eventEmitter,
    debugLogger: logger,
  });

  const summary = shouldUseTUI({ verbose: options.verbose, tui: options.tui })
    ? await runTUI(runner, eventEmitter, selection)
    : await runPlain(runner, eventEmitter, selection, options.verbose);

  await writeSummary(options.resultsDir, summary.results);

  console.log(`\n${formatSummaryLine(summary.passed, summary.total)}`);
  if (summary.passed === summary.total) {
    console.log("All tests passed!");
  }

  if (options.tableFile) {
    logger.startPhase("Table");
    await writeTable(options.tableFile, {
      results: summary.results,
      compilers: selection.compilers,
      tests: selection.tests,
    });
    logger.endPhase("Table");
    console.log(`Table written to: ${options.tableFile}`);
  }

  console.log(`Debug log: ${logger.path}`);
  logger.close();

  if (summary.aborted) {
    console.log("\nCancelled.");
    return SIGINT_EXIT_CODE;
  }
  return summary.passed === summary.total ? 0 : 1;
};

export const runCommand = defineCommand({
  meta: {
    name: "run",
    description:
      "Run every selected test on every selected compiler and write the results\n\n" +
      "EXAMPLES\n" +
      "  # Auto-detection tests only\n" +
      "  macrobench run matrix.yaml\n\n" +
      "  # Every variant, with a Markdown table\n" +
      "  macrobench run matrix.yaml --table\n\n" +
      "  # Two compilers, one group\n" +
      "  macrobench run matrix.yaml -c gcc,clang -g impl",
  },
  args: {
    config: {
      type: "positional",
      description: "Path to the YAML matrix config",
      required: true,
    },
    resultsDir: {
      type: "string",
      alias: "o",
      description: "Directory for output files (default: results)",
    },
    debug: {
      type: "boolean",
      alias: "d",
      description: "Save full API responses for debugging",
      default: false,
    },
    compiler: {
      type: "string",
      alias: "c",
      description: "Filter by compiler nickname (repeatable or comma separated)",
    },
    test: {
      type: "string",
      alias: "t",
      description: "Filter by test name or variant (repeatable or comma separated)",
    },
    group: {
      type: "string",
      alias: "g",
      description: "Filter by test group (repeatable or comma separated)",
    },
    all: {
      type: "boolean",
      alias: "a",
      description: "Run all variants (default: only auto-detection variants)",
      default: false,
    },
    table: {
      type: "boolean",
      alias: "T",
      description: "Write a Markdown summary table (implies --all)",
      default: false,
    },
    tableFile: {
      type: "string",
      description: "Path for the Markdown table (default: <results-dir>/table.md)",
    },
    delay: {
      type: "string",
      description: "Seconds to wait after each API request (default: 0.5)",
    },
    language: {
      type: "string",
      description: "Source language (default: c)",
    },
    preprocessOnly: {
      type: "boolean",
      alias: "P",
      description: "Only preprocess and save the output; no compilation or execution",
      default: false,
    },
    verbose: {
      type: "boolean",
      alias: "v",
      description: "Print every job instead of the progress view",
      default: false,
    },
    tui: {
      type: "boolean",
      description: "Use the interactive progress view when attached to a terminal (--no-tui to disable)",
      default: true,
    },
  },
  run: async ({ args }) => {
    let config: MatrixConfig;
    try {
      config = await loadConfig(args.config);
    } catch (error) {
      console.error(`Error loading config: ${formatError(error)}`);
      process.exit(1);
    }

    const options = resolveRunOptions(args, config.settings);
    if (!options.success) {
      console.error(`Error: ${options.error}`);
      process.exit(1);
    }

    try {
      process.exit(await execute(options.value, config));
    } catch (error) {
      console.error(`\n✗ Run failed: ${formatError(error)}\n`);
      process.exit(1);
    }
  },
});
