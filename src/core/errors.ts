// src/core/errors.ts

/**
 * Remote steps that can fail. Carried on errors and failed outcomes so
 * that log lines say where a sync stopped.
 */
export type SyncStep =
   | 'fetch-collection'
   | 'replace-collection'
   | 'fetch-workspace'
   | 'create-environment'
   | 'build-folders'
   | 'run-hooks';

/**
 * Per-item result for work that degrades instead of failing: a skipped
 * record type, a missing schema, an unreadable file.
 */
export type Outcome<T> =
   | { ok: true; value: T }
   | { ok: false; reason: string };

export function ok<T>(value: T): Outcome<T> {
   return { ok: true, value };
}

export function skip<T>(reason: string): Outcome<T> {
   return { ok: false, reason };
}

/**
 * A call to the collection service failed: non-2xx status, timeout,
 * network error or a body of the wrong shape.
 */
export class RemoteServiceError extends Error {
   readonly step: SyncStep;
   readonly status: number | undefined;
   readonly body: unknown;

   constructor(step: SyncStep, message: string, status?: number, body?: unknown) {
      super(message);
      this.name = 'RemoteServiceError';
      this.step = step;
      this.status = status;
      this.body = body;
   }
}

/**
 * Raised by top-level sync entrypoints so callers can show the
 * underlying message to a user.
 */
export class SyncError extends Error {
   readonly step: SyncStep | undefined;

   constructor(message: string, step?: SyncStep) {
      super(message);
      this.name = 'SyncError';
      this.step = step;
   }
}

export class ConfigError extends Error {
   constructor(message: string) {
      super(message);
      this.name = 'ConfigError';
   }
}

export function errorMessage(err: unknown): string {
   return err instanceof Error ? err.message : String(err);
}
