/**
 * Core type definitions for the n8n client
 */

// Re-export n8n API types
export * from './n8n.js';

export type LogLevel = 'error' | 'warn' | 'info' | 'http' | 'verbose' | 'debug' | 'silly';

export interface Config {
  n8n: {
    baseUrl: string;
    apiKey?: string;
    /** Per-request timeout in milliseconds */
    timeout: number;
  };
  logging: {
    level: LogLevel;
  };
}

export interface ValidationIssue {
  /** Dot-joined field path, `(root)` for the value itself */
  path: string;
  message: string;
}

export interface ErrorReport {
  operation: string;
  code: string;
  error: string;
  timestamp: Date;
}
