/**
 * @fileoverview Error taxonomy for the pipelines.
 *
 * - AppError: base class carrying an error code, recoverability flag and context
 * - ConfigurationError / StateCorruptedError: fatal before any work is done
 * - AuthError: fatal for the run, never retried internally
 * - TransientProviderError / RemoteError / GenerationTimeoutError: per-candidate
 *   or per-run, retried by the next invocation
 * - WriterConflictError: an artifact already exists, treated as success
 */

/**
 * Base class for application-specific errors.
 * Includes error code, recoverability flag, and optional context.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly recoverable: boolean = false,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
  }
}

/**
 * Required configuration is missing or invalid. Collects every problem found.
 */
export class ConfigurationError extends AppError {
  constructor(public readonly problems: string[]) {
    super(`Configuration validation failed:\n  - ${problems.join('\n  - ')}`, 'CONFIGURATION');
    this.name = 'ConfigurationError';
  }
}

/**
 * Provider credentials are missing, expired or lack the needed scopes.
 */
export class AuthError extends AppError {
  constructor(message: string, public readonly provider: 'google' | 'openai', context?: Record<string, unknown>) {
    super(message, 'AUTH', false, context);
    this.name = 'AuthError';
  }
}

/**
 * The mailbox provider failed in a way the next run may not see again.
 */
export class TransientProviderError extends AppError {
  constructor(message: string, public readonly status?: number, context?: Record<string, unknown>) {
    super(message, 'PROVIDER_TRANSIENT', true, context);
    this.name = 'TransientProviderError';
  }
}

/**
 * The assistant provider returned a non-success status, failed a run or timed out.
 */
export class RemoteError extends AppError {
  constructor(message: string, context?: Record<string, unknown>, code = 'REMOTE') {
    super(message, code, true, context);
    this.name = 'RemoteError';
  }
}

export class GenerationTimeoutError extends RemoteError {
  constructor(public readonly attempts: number, public readonly elapsedMs: number) {
    super('generation timeout', { attempts, elapsedMs }, 'GENERATION_TIMEOUT');
    this.name = 'GenerationTimeoutError';
  }
}

/**
 * A draft already exists for the thread at write time.
 */
export class WriterConflictError extends AppError {
  constructor(public readonly threadId: string) {
    super(`A draft already exists for thread ${threadId}`, 'WRITER_CONFLICT', true, { threadId });
    this.name = 'WriterConflictError';
  }
}

/**
 * The persisted processing state could not be parsed.
 */
export class StateCorruptedError extends AppError {
  constructor(public readonly path: string, reason: string) {
    super(`Processing state at ${path} is unreadable: ${reason}`, 'STATE_CORRUPTED', false, { path });
    this.name = 'StateCorruptedError';
  }
}

/**
 * The run finished but its advanced watermark could not be persisted.
 */
export class StateSaveError extends AppError {
  constructor(public readonly pipeline: string, reason: string) {
    super(`Could not save ${pipeline} state: ${reason}`, 'STATE_SAVE_FAILED', true, { pipeline });
    this.name = 'StateSaveError';
  }
}
