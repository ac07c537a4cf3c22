import { truncateBody } from './core/http-utils.js';
import { HttpError } from './types.js';

const quote = (value: string): string => `"${value.replace(/"/g, "'")}"`;

/**
 * Carries what the retry loop saw across attempts, for the one error returned when a
 * logical request is exhausted without a success.
 */
export class DiagnosticsAccumulator {
  private attemptCount = 0;
  private lastBodySnippet: string | undefined;
  private lastError: Error | undefined;
  private lastStatus: number | undefined;

  get attempts(): number {
    return this.attemptCount;
  }

  get status(): number | undefined {
    return this.lastStatus;
  }

  recordAttempt(): void {
    this.attemptCount++;
  }

  recordResponse(status: number, body: string): void {
    this.lastStatus = status;
    this.lastBodySnippet = truncateBody(body);
    this.lastError = new HttpError(`Status: ${status}`, 'status', { statusCode: status });
  }

  recordError(error: Error): void {
    this.lastError = error;
  }

  /**
   * Compose `status=…, body="…", attempts=…, last_err="…"`, omitting fields never observed.
   */
  describe(): string {
    const parts: string[] = [];
    if (this.lastStatus !== undefined) parts.push(`status=${this.lastStatus}`);
    if (this.lastBodySnippet !== undefined) parts.push(`body=${quote(this.lastBodySnippet)}`);
    parts.push(`attempts=${this.attemptCount}`);
    if (this.lastError) parts.push(`last_err=${quote(`${this.lastError.name}: ${this.lastError.message}`)}`);
    return parts.join(', ');
  }

  toError(): HttpError {
    return new HttpError(this.describe(), 'exhausted', {
      attempts: this.attemptCount,
      cause: this.lastError,
      responseBody: this.lastBodySnippet,
      statusCode: this.lastStatus,
    });
  }
}
