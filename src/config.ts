/**
 * @fileoverview Application configuration.
 *
 * All environment variables are read here into one immutable AppConfig value.
 * The value is built once at startup and handed to each component; nothing
 * else reads process.env.
 *
 * @see .env.example for the recognized variables
 */

import 'dotenv/config';
import { existsSync } from 'fs';
import { ConfigurationError } from './utils/errors.js';

type Env = Record<string, string | undefined>;

export type BackoffMode = 'fixed' | 'exponential';

export type Command = 'index-sent' | 'draft-replies' | 'authorize';

export type AppConfig = {
  readonly nodeEnv: string;
  readonly openai: {
    readonly apiKey: string | undefined;
    readonly assistantId: string | undefined;
    readonly vectorStoreId: string | undefined;
  };
  readonly google: {
    readonly credentialsPath: string;
    readonly tokenPath: string;
    readonly redirectUri: string;
  };
  readonly gmail: {
    readonly labelId: string | undefined;
  };
  readonly signature: {
    /** Line that starts a signature block */
    readonly marker: string;
    /** Appended to generated drafts when non-empty */
    readonly text: string;
  };
  readonly state: {
    readonly dir: string;
  };
  readonly generation: {
    readonly pollIntervalMs: number;
    readonly maxPollIntervalMs: number;
    readonly maxAttempts: number;
    readonly timeoutMs: number;
    readonly backoff: BackoffMode;
  };
  readonly indexer: {
    readonly removeLabel: boolean;
  };
  readonly drafter: {
    readonly unreadOnly: boolean;
    readonly markRead: boolean;
    readonly threadContextMessages: number;
  };
};

// ---------------------------------------------------------------------------
// Config helpers — make required vs optional intent explicit
// ---------------------------------------------------------------------------

function reader(env: Env) {
  /** Read a required env var. Returns undefined if missing (caught by validateConfig). */
  const required = (key: string): string | undefined => env[key] || undefined;

  /** Read an optional string env var with a default. */
  const optional = (key: string, defaultValue: string): string => env[key] || defaultValue;

  /** Read an optional integer env var with a default. */
  const optionalInt = (key: string, defaultValue: number): number => {
    const raw = env[key];
    return raw ? parseInt(raw, 10) : defaultValue;
  };

  /** Read an optional boolean env var (defaults to `defaultValue`). */
  const optionalBool = (key: string, defaultValue: boolean): boolean => {
    const raw = env[key];
    if (raw === undefined || raw === '') return defaultValue;
    return raw.toLowerCase() === 'true' || raw === '1';
  };

  /** Return a path that differs between dev and production. */
  const dataPath = (key: string, prodPath: string, devPath: string): string =>
    env[key] || (env.NODE_ENV === 'production' ? prodPath : devPath);

  return { required, optional, optionalInt, optionalBool, dataPath };
}

// ---------------------------------------------------------------------------
// Config value
// ---------------------------------------------------------------------------

export function loadConfig(env: Env = process.env): AppConfig {
  const { required, optional, optionalInt, optionalBool, dataPath } = reader(env);
  const backoff = optional('GENERATION_BACKOFF', 'fixed');

  const config: AppConfig = {
    nodeEnv: optional('NODE_ENV', 'development'),
    openai: {
      apiKey: required('OPENAI_API_KEY'),
      assistantId: required('ASSISTANT_ID'),
      vectorStoreId: required('VECTOR_STORE_ID'),
    },
    google: {
      credentialsPath: optional('GOOGLE_CREDENTIALS_PATH', 'credentials.json'),
      tokenPath: optional('GOOGLE_TOKEN_PATH', 'token.json'),
      redirectUri: optional('REDIRECT_URI', 'http://localhost:8888/'),
    },
    gmail: {
      labelId: required('GMAIL_LABEL_ID'),
    },
    signature: {
      marker: optional('SIGNATURE_MARKER', '--'),
      text: env.EMAIL_SIGNATURE ?? '',
    },
    state: {
      dir: dataPath('STATE_DIR', '/app/data', './data'),
    },
    generation: {
      pollIntervalMs: optionalInt('GENERATION_POLL_INTERVAL_MS', 2000),
      maxPollIntervalMs: optionalInt('GENERATION_MAX_POLL_INTERVAL_MS', 16000),
      maxAttempts: optionalInt('GENERATION_MAX_ATTEMPTS', 60),
      timeoutMs: optionalInt('GENERATION_TIMEOUT_MS', 180000),
      backoff: backoff === 'exponential' ? 'exponential' : 'fixed',
    },
    indexer: {
      removeLabel: optionalBool('INDEXER_REMOVE_LABEL', false),
    },
    drafter: {
      unreadOnly: optionalBool('DRAFTER_UNREAD_ONLY', false),
      markRead: optionalBool('DRAFTER_MARK_READ', false),
      threadContextMessages: optionalInt('THREAD_CONTEXT_MESSAGES', 3),
    },
  };

  return Object.freeze(config);
}

/**
 * Validate the configuration needed by a command.
 * Throws ConfigurationError listing every missing or invalid value.
 * Runs before any network call.
 */
export function validateConfig(
  config: AppConfig,
  command: Command,
  env: Env = process.env
): void {
  const errors: string[] = [];

  if (command !== 'authorize' && !config.openai.apiKey) {
    errors.push('OPENAI_API_KEY is required');
  }

  if (command === 'index-sent') {
    if (!config.openai.vectorStoreId) errors.push('VECTOR_STORE_ID is required');
    if (!config.gmail.labelId) errors.push('GMAIL_LABEL_ID is required');
  }

  if (command === 'draft-replies' && !config.openai.assistantId) {
    errors.push('ASSISTANT_ID is required');
  }

  if (!existsSync(config.google.credentialsPath)) {
    errors.push(`GOOGLE_CREDENTIALS_PATH does not point to a file: ${config.google.credentialsPath}`);
  }

  if (command === 'authorize') {
    try {
      new URL(config.google.redirectUri);
    } catch {
      errors.push(`REDIRECT_URI must be an absolute URL, got ${config.google.redirectUri}`);
    }
  }

  // Numeric bounds
  const { generation, drafter } = config;
  if (!(generation.pollIntervalMs >= 100)) {
    errors.push(`GENERATION_POLL_INTERVAL_MS must be >= 100, got ${generation.pollIntervalMs}`);
  }
  if (!(generation.maxPollIntervalMs >= generation.pollIntervalMs)) {
    errors.push(`GENERATION_MAX_POLL_INTERVAL_MS must be >= GENERATION_POLL_INTERVAL_MS, got ${generation.maxPollIntervalMs}`);
  }
  if (!(generation.maxAttempts >= 1)) {
    errors.push(`GENERATION_MAX_ATTEMPTS must be >= 1, got ${generation.maxAttempts}`);
  }
  if (!(generation.timeoutMs >= 1000)) {
    errors.push(`GENERATION_TIMEOUT_MS must be >= 1000, got ${generation.timeoutMs}`);
  }
  const backoff = env.GENERATION_BACKOFF;
  if (backoff && backoff !== 'fixed' && backoff !== 'exponential') {
    errors.push(`GENERATION_BACKOFF must be 'fixed' or 'exponential', got ${backoff}`);
  }
  if (!(drafter.threadContextMessages >= 0 && drafter.threadContextMessages <= 20)) {
    errors.push(`THREAD_CONTEXT_MESSAGES must be 0-20, got ${drafter.threadContextMessages}`);
  }

  if (errors.length > 0) {
    throw new ConfigurationError(errors);
  }
}
