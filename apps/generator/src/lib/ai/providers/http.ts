import type { CollaboratorFailureKind } from '@examcraft/contracts';
import { TimeoutError, withTimeoutOrError } from '../../runtime/timeout';
import { createLogger } from '../../observability/logger';
import type { CollaboratorFailure, ModelCallMeta, ModelCallResult } from '../model-caller';

const log = createLogger('ai:http');

export interface RetryPolicy {
  timeoutMs: number;
  maxRetries: number;
  retryBaseMs: number;
}

export interface ProviderPost {
  provider: string;
  model: string;
  url: string;
  headers: Record<string, string>;
  body: unknown;
  policy: RetryPolicy;
  /** Pulls the generated text out of a 2xx body; `null` when there is none. */
  extractText: (body: unknown) => string | null;
}

class ProviderHttpError extends Error {
  status: number;
  detail: string;

  constructor(status: number, detail: string) {
    super(
      detail.length > 0
        ? `Provider API error: ${status} ${detail}`
        : `Provider API error: ${status}`
    );
    this.name = 'ProviderHttpError';
    this.status = status;
    this.detail = detail;
  }
}

class EmptyOutputError extends Error {
  constructor() {
    super('Provider returned no text');
    this.name = 'EmptyOutputError';
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function shouldRetry(error: unknown): boolean {
  if (error instanceof ProviderHttpError) {
    return error.status === 408 || error.status === 429 || error.status >= 500;
  }
  if (error instanceof TimeoutError) return true;
  // fetch network failures surface as TypeError
  return error instanceof TypeError;
}

export function classifyFailure(error: unknown): CollaboratorFailureKind {
  if (error instanceof TimeoutError) return 'timeout';
  if (error instanceof EmptyOutputError) return 'empty_output';
  if (error instanceof ProviderHttpError) {
    if (error.status === 429) return 'rate_limited';
    if (error.status === 401 || error.status === 403) return 'config_error';
    if (error.status === 408) return 'timeout';
    return 'provider_error';
  }
  if (error instanceof TypeError) return 'network_error';
  return 'provider_error';
}

function summarizeErrorBody(rawText: string): string {
  let message = rawText;
  try {
    const parsed: unknown = rawText ? JSON.parse(rawText) : rawText;
    if (parsed && typeof parsed === 'object' && 'error' in parsed) {
      const inner = parsed.error;
      if (inner && typeof inner === 'object' && 'message' in inner && typeof inner.message === 'string') {
        message = inner.message;
      } else if (typeof inner === 'string') {
        message = inner;
      }
    }
  } catch {
    message = rawText;
  }
  return message.trim().replace(/\s+/g, ' ').slice(0, 200);
}

function buildMeta(
  request: ProviderPost,
  attemptCount: number,
  status: number | null,
  startedAt: number
): ModelCallMeta {
  return {
    provider: request.provider,
    model: request.model,
    attemptCount: Math.max(1, attemptCount),
    retried: attemptCount > 1,
    status,
    latencyMs: Date.now() - startedAt,
  };
}

async function attemptOnce(request: ProviderPost): Promise<{ text: string; status: number }> {
  const res = await fetch(request.url, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json', ...request.headers },
    body: JSON.stringify(request.body),
  });
  if (!res.ok) {
    const rawText = await res.text().catch(() => '');
    throw new ProviderHttpError(res.status, summarizeErrorBody(rawText));
  }
  const body: unknown = await res.json();
  const text = request.extractText(body);
  if (text === null) throw new EmptyOutputError();
  return { text, status: res.status };
}

/**
 * POSTs to a model endpoint with exponential backoff on 408/429/5xx, timeouts
 * and network errors. Never throws; failures come back as a typed result.
 */
export async function postModelRequest(request: ProviderPost): Promise<ModelCallResult> {
  const startedAt = Date.now();
  const maxRetries = Number.isFinite(request.policy.maxRetries) ? Math.max(0, request.policy.maxRetries) : 1;
  const retryBaseMs = Number.isFinite(request.policy.retryBaseMs) ? Math.max(0, request.policy.retryBaseMs) : 250;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      const { text, status } = await withTimeoutOrError(
        attemptOnce(request),
        request.policy.timeoutMs,
        new TimeoutError(`${request.provider} call`, request.policy.timeoutMs)
      );
      return { success: true, text, meta: buildMeta(request, attempt + 1, status, startedAt) };
    } catch (error) {
      if (attempt >= maxRetries || !shouldRetry(error)) {
        const baseMessage = error instanceof Error ? error.message : 'Provider unknown failure';
        const failure: CollaboratorFailure = {
          kind: classifyFailure(error),
          message: attempt > 0 ? `${baseMessage} (after ${attempt + 1} attempts)` : baseMessage,
          status: error instanceof ProviderHttpError ? error.status : null,
        };
        log.warn(`${request.provider} call failed: ${failure.kind}`, failure.message);
        return {
          success: false,
          failure,
          meta: buildMeta(request, attempt + 1, failure.status, startedAt),
        };
      }

      const waitMs = retryBaseMs * (2 ** attempt);
      log.debug(`${request.provider} retry ${attempt + 1} in ${waitMs}ms`);
      await sleep(waitMs);
    }
  }

  return {
    success: false,
    failure: { kind: 'provider_error', message: 'Provider unknown failure', status: null },
    meta: buildMeta(request, maxRetries + 1, null, startedAt),
  };
}
