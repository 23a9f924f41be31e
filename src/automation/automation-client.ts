import { z } from "zod";
import { logger } from "../config/logger.js";
import type { BuildArtifacts } from "../games/repository-types.js";

/**
 * A function that performs an HTTP fetch. Same as the global fetch signature.
 * This indirection lets tests inject stubs without mocking globals.
 */
export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

export class AutomationError extends Error {
  readonly httpStatus = 502;
  /** Status returned by the automation endpoint, when it answered at all. */
  readonly upstreamStatus: number | null;

  constructor(message: string, upstreamStatus: number | null = null, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "AutomationError";
    this.upstreamStatus = upstreamStatus;
  }
}

const buildResponseSchema = z.object({
  webgl_url: z.string().min(1),
  apk_url: z.string().min(1),
});

export interface AutomationClientConfig {
  /** Base URL of the automation endpoint, e.g. "http://automation:8080" */
  baseUrl: string;
  /** Prefix for relative artifact URLs; defaults to baseUrl. */
  publicBaseUrl?: string;
  /** Per-attempt timeout in ms (default: 30000) */
  timeoutMs?: number;
  /** Delay before the single retry in ms (default: 500) */
  retryDelayMs?: number;
}

/** Failure of one attempt; `retryable` is true for network errors and 5xx. */
interface AttemptFailure {
  retryable: boolean;
  error: AutomationError;
}

export class AutomationClient {
  private readonly baseUrl: string;
  private readonly publicBaseUrl: string;
  private readonly timeoutMs: number;
  private readonly retryDelayMs: number;

  constructor(
    config: AutomationClientConfig,
    private readonly fetchFn: FetchFn = fetch,
  ) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, "");
    this.publicBaseUrl = (config.publicBaseUrl ?? config.baseUrl).replace(/\/+$/, "");
    this.timeoutMs = config.timeoutMs ?? 30_000;
    this.retryDelayMs = config.retryDelayMs ?? 500;
  }

  /** Submit a script for building and return absolute artifact URLs. */
  async build(script: string): Promise<BuildArtifacts> {
    const first = await this.attempt(script);
    if ("webglUrl" in first) return first;
    if (!first.retryable) throw first.error;

    logger.warn("Automation build failed, retrying once", { error: first.error.message });
    await new Promise((resolve) => setTimeout(resolve, this.retryDelayMs));

    const second = await this.attempt(script);
    if ("webglUrl" in second) return second;
    throw second.error;
  }

  /** Resolve a possibly-relative artifact URL against the public base. */
  resolveUrl(url: string): string {
    if (/^https?:\/\//i.test(url)) return url;
    return `${this.publicBaseUrl}${url.startsWith("/") ? "" : "/"}${url}`;
  }

  private async attempt(script: string): Promise<BuildArtifacts | AttemptFailure> {
    let res: Response;
    try {
      res = await this.fetchFn(`${this.baseUrl}/build`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ script }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      return {
        retryable: true,
        error: new AutomationError(`Automation endpoint unreachable: ${msg}`, null, { cause: err }),
      };
    }

    if (!res.ok) {
      await res.body?.cancel();
      return {
        retryable: res.status >= 500,
        error: new AutomationError(`Automation endpoint returned ${res.status}`, res.status),
      };
    }

    let body: unknown;
    try {
      body = await res.json();
    } catch (err) {
      return {
        retryable: false,
        error: new AutomationError("Automation endpoint returned invalid JSON", res.status, { cause: err }),
      };
    }

    const parsed = buildResponseSchema.safeParse(body);
    if (!parsed.success) {
      return {
        retryable: false,
        error: new AutomationError("Automation endpoint response is missing webgl_url/apk_url", res.status),
      };
    }

    return {
      webglUrl: this.resolveUrl(parsed.data.webgl_url),
      apkUrl: this.resolveUrl(parsed.data.apk_url),
    };
  }
}
