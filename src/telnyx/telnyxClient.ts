import { env } from '../env';
import { log } from '../log';
import type { TrunkControl } from '../trunk/types';
import type { TelnyxHangupCause } from './types';

const TELNYX_BASE_URL = 'https://api.telnyx.com/v2';
const TELNYX_TIMEOUT_MS = 8000;
const TELNYX_MAX_RETRIES = 2;
const USER_AGENT = 'sip-dispatch-runtime/0.1.0';

// Retry backoff tuning (keep small; call-control is latency-sensitive)
const TELNYX_RETRY_BASE_MS = 250;
const TELNYX_RETRY_MAX_MS = 1500;

export interface TelnyxClientOptions {
  apiKey?: string;
  baseUrl?: string;
  timeoutMs?: number;
  maxRetries?: number;
  retryBaseMs?: number;
}

export class TelnyxCallControlError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    public readonly responseBody: unknown,
  ) {
    super(message);
    this.name = 'TelnyxCallControlError';
  }
}

function maskTelnyxKey(value: string): string {
  const trimmed = value.trim();
  if (trimmed.length <= 8) {
    return `${trimmed.slice(0, 2)}...${trimmed.slice(-2)}`;
  }
  return `${trimmed.slice(0, 4)}...${trimmed.slice(-4)}`;
}

function shouldRetry(status: number): boolean {
  return status === 429 || status >= 500;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function truncateForLog(value: unknown, max = 800): string {
  try {
    const s = typeof value === 'string' ? value : JSON.stringify(value);
    if (s.length <= max) return s;
    return `${s.slice(0, max)}…(truncated)`;
  } catch {
    return '[unserializable]';
  }
}

export function isCallEndedResponse(status: number, body: unknown): boolean {
  if (status !== 422) {
    return false;
  }
  return /already ended|no longer active/i.test(truncateForLog(body, 4000));
}

async function safeReadBody(response: Response): Promise<unknown> {
  const contentType = response.headers.get('content-type') ?? '';
  if (contentType.includes('application/json')) {
    try {
      return await response.json();
    } catch {
      // fall through to text
    }
  }
  try {
    return await response.text();
  } catch (e) {
    return `<<failed to read response body: ${String(e)}>>`;
  }
}

function isAbortError(err: unknown): boolean {
  return err instanceof Error && (err.name === 'AbortError' || /aborted|AbortError/i.test(err.message));
}

/** Maps a termination reason to the SIP cause Telnyx sends on reject. */
export function rejectCauseFor(reasonCode: string): TelnyxHangupCause {
  return reasonCode === 'AT_CAPACITY' || reasonCode === 'CAPACITY_UNAVAILABLE' ? 'USER_BUSY' : 'CALL_REJECTED';
}

/**
 * Telnyx Call Control client. Commands against a call that Telnyx reports as
 * already ended resolve instead of failing.
 */
export class TelnyxClient implements TrunkControl {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly retryBaseMs: number;

  constructor(options: TelnyxClientOptions = {}) {
    this.apiKey = options.apiKey ?? env.TELNYX_API_KEY;
    this.baseUrl = options.baseUrl ?? TELNYX_BASE_URL;
    this.timeoutMs = options.timeoutMs ?? TELNYX_TIMEOUT_MS;
    this.maxRetries = options.maxRetries ?? TELNYX_MAX_RETRIES;
    this.retryBaseMs = options.retryBaseMs ?? TELNYX_RETRY_BASE_MS;
  }

  public async answer(callId: string): Promise<void> {
    await this.callControl(callId, 'answer', undefined, 0);
    log.info({ event: 'telnyx_answer_call', call_id: callId }, 'telnyx call answered');
  }

  public async reject(callId: string, reasonCode: string): Promise<void> {
    const cause = rejectCauseFor(reasonCode);
    await this.callControl(callId, 'reject', { cause }, 0);
    log.info({ event: 'telnyx_reject_call', call_id: callId, reason: reasonCode, cause }, 'telnyx call rejected');
  }

  public async hangup(callId: string, reasonCode: string): Promise<void> {
    await this.callControl(callId, 'hangup', undefined, 0);
    log.info({ event: 'telnyx_hangup_call', call_id: callId, reason: reasonCode }, 'telnyx call hangup');
  }

  private backoffMs(attempt: number): number {
    const exp = Math.min(TELNYX_RETRY_MAX_MS, this.retryBaseMs * Math.pow(2, attempt));
    const jitter = Math.floor(Math.random() * Math.min(120, this.retryBaseMs)); // small jitter
    return exp + jitter;
  }

  private async callControl(
    callId: string,
    action: string,
    body: Record<string, unknown> | undefined,
    attempt: number,
  ): Promise<unknown> {
    const url = `${this.baseUrl}/calls/${encodeURIComponent(callId)}/actions/${action}`;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    const startedAt = Date.now();

    log.info(
      {
        event: 'telnyx_call_control_request',
        action,
        call_id: callId,
        telnyx_api_key_fingerprint: maskTelnyxKey(this.apiKey),
        attempt,
      },
      'telnyx call-control request',
    );

    try {
      const headers: Record<string, string> = {
        Authorization: `Bearer ${this.apiKey}`,
        Accept: 'application/json',
        'User-Agent': USER_AGENT,
      };

      let payload: string | undefined;
      if (body && Object.keys(body).length > 0) {
        headers['Content-Type'] = 'application/json';
        payload = JSON.stringify(body);
      }

      let response: Response;
      try {
        response = await fetch(url, {
          method: 'POST',
          headers,
          body: payload,
          signal: controller.signal,
        });
      } catch (error) {
        // Abort should not be retried (usually means the API is slow or our timeout too low)
        if (!isAbortError(error) && attempt < this.maxRetries) {
          const waitMs = this.backoffMs(attempt);
          log.warn(
            { event: 'telnyx_call_control_error_retry', action, call_id: callId, attempt, wait_ms: waitMs, err: error },
            'telnyx call-control error retry',
          );
          await sleep(waitMs);
          return this.callControl(callId, action, body, attempt + 1);
        }

        log.error({ event: 'telnyx_call_control_error', action, call_id: callId, err: error }, 'telnyx call-control error');
        throw error;
      }

      const responseBody = await safeReadBody(response);
      const durationMs = Date.now() - startedAt;

      if (response.ok) {
        log.info(
          {
            event: 'telnyx_call_control_completed',
            action,
            call_id: callId,
            status: response.status,
            duration_ms: durationMs,
          },
          'telnyx call-control completed',
        );
        return responseBody;
      }

      const logBody = truncateForLog(responseBody, 1000);

      if (isCallEndedResponse(response.status, responseBody)) {
        log.warn(
          {
            event: 'telnyx_call_control_ignored_post_end',
            action,
            call_id: callId,
            status: response.status,
            duration_ms: durationMs,
            body: logBody,
          },
          'telnyx call-control ignored post end',
        );
        return responseBody;
      }

      if (shouldRetry(response.status) && attempt < this.maxRetries) {
        const waitMs = this.backoffMs(attempt);
        log.warn(
          {
            event: 'telnyx_call_control_retry',
            action,
            call_id: callId,
            status: response.status,
            duration_ms: durationMs,
            wait_ms: waitMs,
            attempt,
            body: logBody,
          },
          'telnyx call-control retry',
        );
        await sleep(waitMs);
        return this.callControl(callId, action, body, attempt + 1);
      }

      log.error(
        {
          event: 'telnyx_call_control_failed',
          action,
          call_id: callId,
          status: response.status,
          duration_ms: durationMs,
          body: logBody,
        },
        'telnyx call-control failed',
      );

      throw new TelnyxCallControlError(
        `Telnyx call-control ${action} failed: ${response.status} ${truncateForLog(responseBody, 1200)}`,
        response.status,
        responseBody,
      );
    } finally {
      clearTimeout(timer);
    }
  }
}
