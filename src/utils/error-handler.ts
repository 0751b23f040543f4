import { logger } from './logger.js';
import type { ErrorReport, ValidationIssue } from '../types/index.js';

export class N8nClientError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'N8nClientError';
  }
}

/**
 * Transport failure, timeout, closed client or failed connectivity probe
 */
export class ConnectionError extends N8nClientError {
  constructor(
    message: string,
    context?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, 'CONNECTION_ERROR', context, options);
    this.name = 'ConnectionError';
  }
}

/**
 * The server answered with a non-2xx status.
 * `body` is the raw response text.
 */
export class ApiError extends N8nClientError {
  constructor(
    public readonly status: number,
    public readonly body: string,
    context?: Record<string, unknown>
  ) {
    super(apiErrorMessage(status, body), 'API_ERROR', context);
    this.name = 'ApiError';
  }
}

export class ValidationError extends N8nClientError {
  constructor(
    public readonly entity: string,
    public readonly issues: ValidationIssue[],
    context?: Record<string, unknown>
  ) {
    super(
      `Invalid ${entity}: ${formatIssues(issues)}`,
      'VALIDATION_ERROR',
      context
    );
    this.name = 'ValidationError';
  }
}

export class BlueprintError extends N8nClientError {
  constructor(
    message: string,
    context?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, 'BLUEPRINT_ERROR', context, options);
    this.name = 'BlueprintError';
  }
}

export function formatIssues(issues: ValidationIssue[]): string {
  return issues.map((issue) => `${issue.path} (${issue.message})`).join('; ');
}

function apiErrorMessage(status: number, body: string): string {
  const detail = extractApiMessage(body);
  return `n8n API request failed with status ${status}${detail ? `: ${detail}` : ''}`;
}

function extractApiMessage(body: string): string | undefined {
  if (!body) return undefined;
  try {
    const parsed: unknown = JSON.parse(body);
    if (
      typeof parsed === 'object' &&
      parsed !== null &&
      'message' in parsed &&
      typeof parsed.message === 'string'
    ) {
      return parsed.message;
    }
    return undefined;
  } catch {
    // Plain-text error pages are reported through `body` only
    return undefined;
  }
}

export function handleError(error: unknown, operation: string): ErrorReport {
  const errorMessage = error instanceof Error ? error.message : String(error);
  const code = error instanceof N8nClientError ? error.code : 'UNKNOWN_ERROR';
  const details = error instanceof N8nClientError ? error.context : undefined;

  logger.error(`${operation} failed`, {
    code,
    error: errorMessage,
    details,
  });

  return {
    operation,
    code,
    error: errorMessage,
    timestamp: new Date(),
  };
}
