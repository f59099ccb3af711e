import { err, ok, type Result } from "@macrobench/result";
import { ExplorerRequestError } from "./errors.js";
import { readCompileResponse } from "./parse-response.js";
import type { CompileRequest, CompileResponse } from "./types.js";

export const DEFAULT_API_URL = "https://godbolt.org/api/compiler";

/**
 * Per-request timeout (60s).
 */
export const DEFAULT_TIMEOUT_MS = 60_000;

/**
 * Anything that can answer a compile request. The HTTP client is the real
 * one; tests substitute in-process fakes.
 */
export interface CompilationService {
  compile(
    compilerId: string,
    request: CompileRequest
  ): Promise<Result<CompileResponse>>;
}

export interface ExplorerClientOptions {
  readonly baseUrl?: string;
  readonly timeoutMs?: number;
  /**
   * Receives one line per request and per response.
   */
  readonly log?: (message: string) => void;
  /**
   * Receives every decoded response body, e.g. to save raw responses.
   */
  readonly onResponse?: (compilerId: string, body: unknown) => void;
}

/**
 * Service URL from `MACROBENCH_API_URL`, then the configured value, then the
 * public instance.
 */
export const resolveApiUrl = (
  configured?: string,
  env: NodeJS.ProcessEnv = process.env
): string => env.MACROBENCH_API_URL || configured || DEFAULT_API_URL;

const isTimeout = (error: unknown): boolean =>
  error instanceof Error &&
  (error.name === "TimeoutError" || error.name === "AbortError");

const describeThrown = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/**
 * HTTP client for the compile endpoint. Failures are returned, never thrown,
 * and never retried.
 */
export class ExplorerClient implements CompilationService {
  readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly log?: (message: string) => void;
  private readonly onResponse?: (compilerId: string, body: unknown) => void;

  constructor(options: ExplorerClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_API_URL).replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.log = options.log;
    this.onResponse = options.onResponse;
  }

  urlFor(compilerId: string): string {
    return `${this.baseUrl}/${encodeURIComponent(compilerId)}/compile`;
  }

  async compile(
    compilerId: string,
    request: CompileRequest
  ): Promise<Result<CompileResponse>> {
    let body: unknown;
    try {
      body = await this.post(compilerId, request);
    } catch (error) {
      if (error instanceof ExplorerRequestError) {
        return err(error.message, error.statusCode);
      }
      return err(`Network error: ${describeThrown(error)}`);
    }

    try {
      this.onResponse?.(compilerId, body);
    } catch (error) {
      return err(`Response hook failed: ${describeThrown(error)}`);
    }

    const response = readCompileResponse(body);
    if (!response) {
      return err("Invalid JSON in response: expected an object");
    }
    return ok(response);
  }

  private async post(
    compilerId: string,
    request: CompileRequest
  ): Promise<unknown> {
    const url = this.urlFor(compilerId);
    const startedAt = Date.now();
    this.log?.(`POST ${url}`);

    let response: Response;
    try {
      response = await fetch(url, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Accept: "application/json",
        },
        body: JSON.stringify(request),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      if (isTimeout(error)) {
        throw new ExplorerRequestError(
          `Request timed out after ${this.timeoutMs}ms`
        );
      }
      throw new ExplorerRequestError(`Network error: ${describeThrown(error)}`);
    }

    this.log?.(
      `HTTP ${response.status} from ${compilerId} in ${Date.now() - startedAt}ms`
    );

    if (!response.ok) {
      throw new ExplorerRequestError(
        `HTTP ${response.status}: ${response.statusText}`,
        response.status
      );
    }

    try {
      const body: unknown = await response.json();
      return body;
    } catch (error) {
      throw new ExplorerRequestError(
        `Invalid JSON in response: ${describeThrown(error)}`
      );
    }
  }
}
