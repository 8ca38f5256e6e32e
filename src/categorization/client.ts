import { z } from 'zod';
import { OracleError } from '../errors.js';
import { buildCategorizationPrompt } from './prompt.js';

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface CategorizationClientConfig {
  /** Service credential. Calls fail with OracleUnreachable while it is empty. */
  apiKey: string;
  /** API base URL, e.g. https://generativelanguage.googleapis.com/v1beta */
  apiUrl: string;
  model: string;
  /** Upper bound for one call, including reading the body. */
  timeoutMs: number;
}

/** Longest label accepted from the oracle. */
export const MAX_CATEGORY_LENGTH = 50;

const GenerateContentResponseSchema = z.object({
  candidates: z.array(z.object({
    content: z.object({
      parts: z.array(z.object({ text: z.string().optional() })).default([]),
    }).optional(),
    finishReason: z.string().optional(),
  })).min(1),
});

/**
 * Client for the external categorization oracle (Gemini `generateContent`).
 *
 * Exactly one HTTP request per `classify()` call, bounded by `timeoutMs`.
 * Every failure surfaces as an OracleError with a kind; retrying is the
 * caller's decision.
 */
export class CategorizationClient {
  private config: CategorizationClientConfig;
  private fetchImpl: FetchLike;

  constructor(config: CategorizationClientConfig, deps?: { fetchImpl?: FetchLike }) {
    this.config = config;
    this.fetchImpl = deps?.fetchImpl ?? ((url, init) => fetch(url, init));
  }

  async classify(domain: string): Promise<string> {
    if (!this.config.apiKey) {
      throw new OracleError('OracleUnreachable', 'Categorization credential is not configured');
    }

    const url = `${this.config.apiUrl.replace(/\/+$/, '')}/models/${encodeURIComponent(this.config.model)}:generateContent`;
    const signal = AbortSignal.timeout(this.config.timeoutMs);

    let response: Response;
    let body: unknown;
    try {
      response = await this.fetchImpl(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'Accept': 'application/json',
          'x-goog-api-key': this.config.apiKey,
        },
        body: JSON.stringify({
          contents: [{ role: 'user', parts: [{ text: buildCategorizationPrompt(domain) }] }],
          generationConfig: { temperature: 0 },
        }),
        signal,
      });

      if (response.status === 429) {
        throw new OracleError('OracleRateLimited', `Oracle rate limited lookup for ${domain}`, {
          retryAfterMs: parseRetryAfter(response.headers.get('retry-after')),
        });
      }
      if (!response.ok) {
        throw new OracleError('OracleUnreachable', `Oracle returned HTTP ${response.status} for ${domain}`);
      }

      body = await response.json();
    } catch (error) {
      throw this.classifyFailure(error, domain, signal);
    }

    return extractCategory(body, domain);
  }

  private classifyFailure(error: unknown, domain: string, signal: AbortSignal): OracleError {
    if (error instanceof OracleError) return error;
    if (signal.aborted || isTimeout(error)) {
      return new OracleError(
        'OracleTimeout',
        `Oracle did not answer for ${domain} within ${this.config.timeoutMs}ms`,
        { cause: error },
      );
    }
    if (error instanceof SyntaxError) {
      return new OracleError('OracleMalformedResponse', `Oracle sent invalid JSON for ${domain}`, { cause: error });
    }
    return new OracleError('OracleUnreachable', `Oracle request failed for ${domain}`, { cause: error });
  }
}

/** Pull a category label out of a generateContent reply. */
export function extractCategory(body: unknown, domain: string): string {
  const parsed = GenerateContentResponseSchema.safeParse(body);
  if (!parsed.success) {
    throw new OracleError('OracleMalformedResponse', `Unexpected oracle reply shape for ${domain}`, {
      cause: parsed.error,
    });
  }

  const text = parsed.data.candidates[0]?.content?.parts.map(p => p.text ?? '').join('') ?? '';
  const category = cleanCategory(text);

  if (category.length === 0) {
    throw new OracleError('OracleMalformedResponse', `Oracle returned no category for ${domain}`);
  }
  if (category.length > MAX_CATEGORY_LENGTH) {
    throw new OracleError(
      'OracleMalformedResponse',
      `Oracle returned an unusable category for ${domain} (${category.length} chars)`,
    );
  }
  return category;
}

/**
 * Reduce a model reply to a bare label: the text after the last colon of
 * the whole reply, its first non-empty line, without quotes, emphasis or a
 * trailing period.
 */
export function cleanCategory(text: string): string {
  const reply = text.trim();
  const label = reply.slice(reply.lastIndexOf(':') + 1);
  const line = label.split(/\r?\n/).map(l => l.trim()).find(l => l.length > 0) ?? '';
  return line
    .replace(/^[\s"'`*]+/, '')
    .replace(/[\s"'`*.]+$/, '')
    .replace(/\s+/g, ' ');
}

function parseRetryAfter(header: string | null): number | undefined {
  if (!header) return undefined;
  const seconds = Number.parseFloat(header);
  if (Number.isFinite(seconds) && seconds >= 0) return Math.ceil(seconds * 1000);
  const date = Date.parse(header);
  if (Number.isFinite(date)) return Math.max(0, date - Date.now());
  return undefined;
}

function isTimeout(error: unknown): boolean {
  return error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
}
