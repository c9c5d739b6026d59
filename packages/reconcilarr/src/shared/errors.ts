/**
 * Error taxonomy
 * AdapterError and ConfigurationError abort a command; ApplyError is
 * collected per item by the sync engine.
 */

import type { ServerName } from './types.js';

export type ReconcileErrorCode = 'adapter' | 'configuration' | 'apply';

export class ReconcileError extends Error {
  constructor(readonly code: ReconcileErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Backend unreachable, non-2xx response, timeout or malformed body */
export class AdapterError extends ReconcileError {
  constructor(
    readonly server: ServerName,
    message: string,
    readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super('adapter', `${server}: ${message}`, options);
  }
}

/** Invalid threshold, kind, server, direction or missing credentials */
export class ConfigurationError extends ReconcileError {
  constructor(message: string) {
    super('configuration', message);
  }
}

/** A single watched-status write that failed while applying a plan */
export class ApplyError extends ReconcileError {
  constructor(readonly itemId: string, cause: unknown) {
    super('apply', `Failed to update item ${itemId}: ${errorMessage(cause)}`, { cause });
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
