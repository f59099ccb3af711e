/**
 * Debug logger for per-run troubleshooting.
 * Writes to <results-dir>/debug.log, which is recreated with the results
 * directory on every run.
 *
 * Features:
 * - Timestamped entries
 * - Phase timing
 * - Request and toolchain command capture
 */

import { appendFileSync, mkdirSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { formatDiagnostic, parseDiagnostics } from "@macrobench/diagnostics";

export interface DebugLogHeader {
  readonly configPath: string;
  readonly resultsDir: string;
  readonly apiUrl: string;
  readonly language: string;
  readonly delayMs: number;
  readonly runAll: boolean;
  readonly preprocessOnly: boolean;
  readonly compilers: number;
  readonly tests: number;
}

/**
 * Per-run debug logger.
 */
export class DebugLogger {
  private readonly logPath: string;
  private closed = false;
  private readonly phaseStartTimes = new Map<string, number>();

  constructor(logPath: string) {
    this.logPath = logPath;
    this.initializeLogFile();
    this.log("DebugLogger initialized");
  }

  private initializeLogFile(): void {
    try {
      mkdirSync(dirname(this.logPath), { recursive: true });
      const header = `${"=".repeat(80)}\nmacrobench debug log\nStarted: ${this.formatTimestamp()}\n${"=".repeat(80)}\n\n`;
      writeFileSync(this.logPath, header);
    } catch {
      // Logging stays off when the file cannot be created.
      this.closed = true;
    }
  }

  /**
   * Formats a timestamp in ISO 8601 format with local timezone offset.
   */
  private formatTimestamp(): string {
    const now = new Date();
    const offset = -now.getTimezoneOffset();
    const offsetHours = String(Math.floor(Math.abs(offset) / 60)).padStart(
      2,
      "0"
    );
    const offsetMinutes = String(Math.abs(offset) % 60).padStart(2, "0");
    const offsetSign = offset >= 0 ? "+" : "-";

    const iso = now.toISOString().slice(0, -1);
    return `${iso}${offsetSign}${offsetHours}:${offsetMinutes}`;
  }

  /**
   * Logs a message with timestamp.
   */
  log(message: string): void {
    if (this.closed) {
      return;
    }

    try {
      appendFileSync(this.logPath, `${this.formatTimestamp()} ${message}\n`);
    } catch {
      this.closed = true;
    }
  }

  /**
   * Logs a phase-scoped line, e.g. "[Job] impl_auto on GCC 13.2".
   */
  logPhase(phase: string, message: string): void {
    this.log(`[${phase}] ${message}`);
  }

  /**
   * Logs multi-line output under a label, indented.
   */
  logOutput(label: string, output: string): void {
    if (output.length === 0) {
      return;
    }
    const indented = output
      .trimEnd()
      .split("\n")
      .map((line) => `    ${line}`)
      .join("\n");
    this.log(`${label}:\n${indented}`);
  }

  /**
   * Logs each gcc/clang diagnostic found in compiler output on its own line.
   */
  logDiagnostics(phase: string, output: string): void {
    for (const diagnostic of parseDiagnostics(output)) {
      this.logPhase(phase, formatDiagnostic(diagnostic));
    }
  }

  /**
   * Logs an error with stack trace.
   */
  logError(error: unknown, context?: string): void {
    const prefix = context ? `[${context}] ` : "";

    if (error instanceof Error) {
      this.log(`${prefix}Error: ${error.message}`);
      if (error.stack) {
        this.log(`Stack trace:\n${error.stack}`);
      }
    } else {
      this.log(`${prefix}Error: ${String(error)}`);
    }
  }

  close(): void {
    if (this.closed) {
      return;
    }

    this.log("DebugLogger closed");
    this.log(`${"=".repeat(80)}\n`);
    this.closed = true;
  }

  /**
   * Gets the absolute path to the log file.
   */
  get path(): string {
    return this.logPath;
  }

  /**
   * Logs configuration information at the start of a run.
   */
  logHeader(header: DebugLogHeader): void {
    this.log("=".repeat(80));
    this.log("Configuration:");
    this.log(`  Config: ${header.configPath}`);
    this.log(`  Results: ${header.resultsDir}`);
    this.log(`  Service: ${header.apiUrl}`);
    this.log(`  Language: ${header.language}`);
    this.log(`  Delay: ${header.delayMs}ms`);
    this.log(`  All variants: ${header.runAll}`);
    this.log(`  Preprocess only: ${header.preprocessOnly}`);
    this.log(`  Compilers: ${header.compilers}`);
    this.log(`  Tests: ${header.tests}`);
    this.log("=".repeat(80));
    this.log("");
  }

  /**
   * Logs environment information.
   */
  logEnvironment(): void {
    this.log("Environment:");
    this.log(`  OS: ${process.platform} ${process.arch}`);
    this.log(`  Node: ${process.version}`);
    this.log("");
  }

  /**
   * Logs a section separator with title.
   */
  logSection(title: string): void {
    this.log("");
    this.log("=".repeat(80));
    this.log(title);
    this.log("=".repeat(80));
    this.log("");
  }

  /**
   * Starts timing a phase.
   */
  startPhase(phase: string): void {
    this.phaseStartTimes.set(phase, Date.now());
    this.logPhase(phase, "Starting");
  }

  /**
   * Ends timing a phase and logs the duration.
   */
  endPhase(phase: string): void {
    const start = this.phaseStartTimes.get(phase);
    if (start !== undefined) {
      this.logPhase(phase, `Completed in ${Date.now() - start}ms`);
      this.phaseStartTimes.delete(phase);
    }
  }
}
