/**
 * Generation backend client.
 *
 * The backend turns a plaintext query plus transcript into an answer with
 * source citations. Every failure (non-2xx, timeout, transport, malformed
 * body) surfaces as UpstreamUnavailableError so the pipeline can treat them
 * all the same way.
 */

import { z } from "zod";
import { UpstreamUnavailableError } from "../errors.js";
import type { MessageRole } from "../store/types.js";

export interface GenerationTurn {
  role: MessageRole;
  content: string;
}

export interface GenerationRequest {
  query: string;
  history: GenerationTurn[];
  maxTokens: number;
}

export interface GenerationResult {
  answer: string;
  sources: string[];
}

export interface GenerationBackend {
  generate(request: GenerationRequest, signal?: AbortSignal): Promise<GenerationResult>;
}

// ---------------------------------------------------------------------------
// HTTP implementation
// ---------------------------------------------------------------------------

export const DEFAULT_GENERATION_TIMEOUT_MS = 30_000;

const GenerationResponseSchema = z.object({
  answer: z.string(),
  sources: z
    .array(
      z
        .object({
          metadata: z.object({ source: z.string() }).passthrough(),
        })
        .passthrough(),
    )
    .default([]),
});

export interface HttpGenerationBackendConfig {
  /** Full endpoint URL, e.g. http://localhost:8001/generate */
  url: string;
  timeoutMs?: number;
  /** Extra request headers (auth tokens and the like). */
  headers?: Record<string, string>;
  fetch?: typeof fetch;
}

export class HttpGenerationBackend implements GenerationBackend {
  private readonly url: string;
  private readonly timeoutMs: number;
  private readonly headers: Record<string, string>;
  private readonly fetchImpl: typeof fetch;

  constructor(config: HttpGenerationBackendConfig) {
    this.url = config.url;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_GENERATION_TIMEOUT_MS;
    this.headers = { "Content-Type": "application/json", ...config.headers };
    this.fetchImpl = config.fetch ?? fetch;
  }

  async generate(
    request: GenerationRequest,
    signal?: AbortSignal,
  ): Promise<GenerationResult> {
    const timeout = AbortSignal.timeout(this.timeoutMs);
    const combined = signal ? AbortSignal.any([signal, timeout]) : timeout;

    let res: Response;
    try {
      res = await this.fetchImpl(this.url, {
        method: "POST",
        headers: this.headers,
        body: JSON.stringify({
          query: request.query,
          history: request.history,
          max_tokens: request.maxTokens,
        }),
        signal: combined,
      });
    } catch (err: unknown) {
      if (signal?.aborted) throw signal.reason;
      if (timeout.aborted) {
        throw new UpstreamUnavailableError(
          `Generation backend timed out after ${this.timeoutMs} ms`,
          "TIMEOUT",
          { url: this.url, timeoutMs: this.timeoutMs },
        );
      }
      throw new UpstreamUnavailableError(
        `Generation backend unreachable: ${err instanceof Error ? err.message : String(err)}`,
        "TRANSPORT",
        { url: this.url },
      );
    }

    if (!res.ok) {
      // Error bodies are discarded unread.
      await res.body?.cancel();
      throw new UpstreamUnavailableError(
        `Generation backend returned ${res.status}`,
        "HTTP_STATUS",
        { url: this.url, status: res.status },
      );
    }

    let body: unknown;
    try {
      body = await res.json();
    } catch (err: unknown) {
      if (signal?.aborted) throw signal.reason;
      throw new UpstreamUnavailableError(
        "Generation backend returned a non-JSON body",
        "BAD_RESPONSE",
        { url: this.url, cause: err instanceof Error ? err.message : String(err) },
      );
    }

    const parsed = GenerationResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new UpstreamUnavailableError(
        "Generation backend response has an unexpected shape",
        "BAD_RESPONSE",
        { url: this.url, issues: parsed.error.issues },
      );
    }

    return {
      answer: parsed.data.answer,
      sources: parsed.data.sources.map((s) => s.metadata.source),
    };
  }
}
