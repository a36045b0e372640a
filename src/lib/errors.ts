/**
 * Error taxonomy shared by every resource handler.
 *
 * - {@link ValidationError}: the declared input is unusable; raised before any
 *   request is sent.
 * - {@link ApiError}: the cluster answered with a non-2xx status.
 * - {@link TransportError}: the request never got an answer.
 *
 * Each carries a short `summary` and a longer `detail`, which the tool layer
 * returns to the caller as-is.
 *
 * @module
 */
import type { ZodError } from 'zod';

export class ProviderError extends Error {
  readonly summary: string;
  readonly detail: string;

  constructor(summary: string, detail: string, options?: { cause?: unknown }) {
    super(detail ? `${summary} ${detail}` : summary, options);
    this.name = new.target.name;
    this.summary = summary;
    this.detail = detail;
  }
}

export class ValidationError extends ProviderError {}

export class ApiError extends ProviderError {
  readonly statusCode: number;
  readonly body: unknown;

  constructor(summary: string, statusCode: number, body: unknown) {
    super(summary, `Failed with: ${typeof body === 'string' ? body : JSON.stringify(body)}`);
    this.statusCode = statusCode;
    this.body = body;
  }
}

export class TransportError extends ProviderError {}

/** A response as seen by {@link checkResponse}. */
export interface StatusResponse {
  statusCode: number;
  body: unknown;
}

export function isSuccess(res: StatusResponse): boolean {
  return res.statusCode >= 200 && res.statusCode < 300;
}

/**
 * Throws an {@link ApiError} for every non-2xx response.
 *
 * @param summary - What the caller was trying to do, e.g. `"Unable to delete ILM policy."`.
 */
export function checkResponse(res: StatusResponse, summary: string): void {
  if (!isSuccess(res)) {
    throw new ApiError(summary, res.statusCode, res.body);
  }
}

/** Converts a zod failure into a {@link ValidationError} listing every issue. */
export function fromZodError(error: ZodError, summary: string): ValidationError {
  const detail = error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
  return new ValidationError(summary, detail);
}
