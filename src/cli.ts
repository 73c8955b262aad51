/**
 * @fileoverview Command-line entry for the scheduled pipelines.
 *
 * Usage:
 *   inbox-drafter index-sent      Index labeled sent mail into the vector store
 *   inbox-drafter draft-replies   Draft replies for inbox mail without a draft
 *   inbox-drafter authorize       One-time Google consent, writes the token file
 *
 * Exit codes: 0 when a run completes (per-message failures included),
 * 1 on configuration, startup or state-save failure, 2 on authentication
 * failure.
 */

import { loadConfig, validateConfig, type AppConfig, type Command } from './config.js';
import { createOpenAiClient, OpenAiAssistant } from './domains/assistant/providers/openai.js';
import type { AssistantProvider } from './domains/assistant/types.js';
import { getAuthenticatedClient } from './domains/google-core/providers/auth.js';
import { runConsentFlow } from './domains/google-core/providers/consent.js';
import { createGmailMailbox } from './domains/mailbox/providers/gmail.js';
import type { MailboxProvider } from './domains/mailbox/types.js';
import { createFileProgressTracker } from './domains/pipeline/repo/state-file.js';
import { runDraftPipeline } from './domains/pipeline/service/draft-pipeline.js';
import { runIndexPipeline } from './domains/pipeline/service/index-pipeline.js';
import type { PipelineName, ProgressTracker, RunSummary } from './domains/pipeline/types.js';
import { AppError, AuthError, ConfigurationError, StateSaveError } from './utils/errors.js';
import { createLogger, createRunId, withLogContext, type AppLogger } from './utils/observability/index.js';

export const EXIT_OK = 0;
export const EXIT_STARTUP_FAILURE = 1;
export const EXIT_AUTH_FAILURE = 2;

const COMMANDS: readonly Command[] = ['index-sent', 'draft-replies', 'authorize'];

export type Runtime = {
  mailbox: MailboxProvider;
  assistant: AssistantProvider;
};

export type CliDeps = {
  env?: Record<string, string | undefined>;
  logger?: AppLogger;
  createRuntime?: (config: AppConfig, logger: AppLogger) => Runtime;
  createTracker?: (config: AppConfig, pipeline: PipelineName) => ProgressTracker;
  authorize?: (config: AppConfig, logger: AppLogger) => Promise<void>;
  print?: (text: string) => void;
};

export type ParsedArgs =
  | { kind: 'help' }
  | { kind: 'command'; command: Command }
  | { kind: 'invalid'; reason: string };

function isCommand(value: string): value is Command {
  return COMMANDS.some((command) => command === value);
}

export function parseArgs(args: string[]): ParsedArgs {
  if (args.length === 0 || args.includes('--help') || args.includes('-h')) {
    return { kind: 'help' };
  }
  const [first, ...rest] = args;
  if (!isCommand(first)) {
    return { kind: 'invalid', reason: `Unknown command: ${first}` };
  }
  if (rest.length > 0) {
    return { kind: 'invalid', reason: `Unexpected arguments: ${rest.join(' ')}` };
  }
  return { kind: 'command', command: first };
}

export const USAGE = `
Usage: inbox-drafter <command>

Commands:
  index-sent      Upload labeled sent mail to the vector store
  draft-replies   Create reply drafts for inbox mail that has none
  authorize       Run the one-time Google consent flow

Options:
  --help, -h      Show this help message

Configuration is read from the environment and .env (see .env.example).
`;

/**
 * Build the Gmail and OpenAI providers. Reads the token file; makes no
 * network call.
 */
export function createRuntime(config: AppConfig, logger: AppLogger): Runtime {
  const apiKey = config.openai.apiKey;
  if (!apiKey) {
    throw new ConfigurationError(['OPENAI_API_KEY is required']);
  }
  const auth = getAuthenticatedClient(config.google.credentialsPath, config.google.tokenPath, logger);
  return {
    mailbox: createGmailMailbox(auth, logger.child({ domain: 'gmail' })),
    assistant: new OpenAiAssistant(createOpenAiClient(apiKey), logger.child({ domain: 'openai' })),
  };
}

function defaultAuthorize(config: AppConfig, logger: AppLogger): Promise<void> {
  return runConsentFlow({
    credentialsPath: config.google.credentialsPath,
    tokenPath: config.google.tokenPath,
    redirectUri: config.google.redirectUri,
  }, logger);
}

async function runCommand(
  command: PipelineName,
  config: AppConfig,
  logger: AppLogger,
  deps: CliDeps
): Promise<RunSummary> {
  const runtime = (deps.createRuntime ?? createRuntime)(config, logger);
  const tracker = deps.createTracker
    ? deps.createTracker(config, command)
    : createFileProgressTracker(config.state.dir, command);

  const pipelineDeps = { config, tracker, logger, ...runtime };
  return command === 'index-sent'
    ? runIndexPipeline(pipelineDeps)
    : runDraftPipeline(pipelineDeps);
}

/**
 * Run one command and return the process exit code.
 */
export async function main(args: string[], deps: CliDeps = {}): Promise<number> {
  const print = deps.print ?? ((text: string) => process.stdout.write(text));
  const parsed = parseArgs(args);

  if (parsed.kind === 'help') {
    print(USAGE);
    return EXIT_OK;
  }

  const logger = deps.logger ?? createLogger({ domain: 'cli' });
  if (parsed.kind === 'invalid') {
    logger.error('invalid_arguments', { reason: parsed.reason });
    print(USAGE);
    return EXIT_STARTUP_FAILURE;
  }

  const { command } = parsed;
  const env = deps.env ?? process.env;

  try {
    const config = loadConfig(env);
    validateConfig(config, command, env);

    if (command === 'authorize') {
      await (deps.authorize ?? defaultAuthorize)(config, logger);
      return EXIT_OK;
    }

    const runId = createRunId(command === 'index-sent' ? 'index' : 'draft');
    await withLogContext({ runId, pipeline: command }, () =>
      runCommand(command, config, logger.child({ pipeline: command }), deps));
    return EXIT_OK;
  } catch (error) {
    if (error instanceof ConfigurationError) {
      logger.error('configuration_invalid', { problems: error.problems });
      return EXIT_STARTUP_FAILURE;
    }
    if (error instanceof AuthError) {
      logger.error('auth_failed', { provider: error.provider, error: error.message });
      return EXIT_AUTH_FAILURE;
    }
    if (error instanceof StateSaveError) {
      logger.error('state_save_failed', { pipeline: error.pipeline, error: error.message });
      return EXIT_STARTUP_FAILURE;
    }
    logger.error('startup_failed', {
      code: error instanceof AppError ? error.code : undefined,
      error: error instanceof Error ? error.message : String(error),
    });
    return EXIT_STARTUP_FAILURE;
  }
}
