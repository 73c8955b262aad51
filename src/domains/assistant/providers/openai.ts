/**
 * @fileoverview OpenAI assistant provider.
 *
 * Files API + vector stores for ingestion, Assistants threads and runs for
 * generation. SDK errors are mapped to AuthError (401) or RemoteError.
 */

import OpenAI, { toFile } from 'openai';
import { AuthError, RemoteError } from '../../../utils/errors.js';
import type { AppLogger } from '../../../utils/observability/index.js';
import type { AssistantProvider, RunHandle, RunPoll } from '../types.js';

/** Per-request timeout; the SDK retries connection errors, 429 and 5xx itself. */
const REQUEST_TIMEOUT_MS = 60_000;
const MAX_SDK_RETRIES = 2;

/** Messages fetched when looking for a run's reply. */
const REPLY_LOOKBACK = 20;

export function createOpenAiClient(apiKey: string): OpenAI {
  return new OpenAI({ apiKey, timeout: REQUEST_TIMEOUT_MS, maxRetries: MAX_SDK_RETRIES });
}

/**
 * Convert an SDK failure into the pipeline error taxonomy.
 */
export function toRemoteError(error: unknown, operation: string): AuthError | RemoteError {
  if (error instanceof AuthError || error instanceof RemoteError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  if (error instanceof OpenAI.AuthenticationError) {
    return new AuthError(`OpenAI ${operation} rejected the API key: ${message}`, 'openai', { operation });
  }
  if (error instanceof OpenAI.APIError) {
    return new RemoteError(`OpenAI ${operation} failed: ${message}`, { operation, status: error.status });
  }
  return new RemoteError(`OpenAI ${operation} failed: ${message}`, { operation });
}

export class OpenAiAssistant implements AssistantProvider {
  constructor(
    private readonly client: OpenAI,
    private readonly logger: AppLogger
  ) {}

  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      const mapped = toRemoteError(error, operation);
      this.logger.debug('openai_call_failed', { operation, code: mapped.code });
      throw mapped;
    }
  }

  async uploadFile(text: string, filename: string): Promise<string> {
    const upload = await toFile(Buffer.from(text, 'utf-8'), filename, { type: 'text/plain' });
    const file = await this.call('files.create', () => this.client.files.create({
      file: upload,
      purpose: 'assistants',
    }));
    return file.id;
  }

  async attachFile(vectorStoreId: string, fileId: string): Promise<void> {
    await this.call('vectorStores.files.create', () => this.client.vectorStores.files.create(vectorStoreId, {
      file_id: fileId,
    }));
  }

  async createThreadRun(assistantId: string, input: string): Promise<RunHandle> {
    const run = await this.call('threads.createAndRun', () => this.client.beta.threads.createAndRun({
      assistant_id: assistantId,
      thread: {
        messages: [{ role: 'user', content: input }],
      },
    }));
    return { threadId: run.thread_id, runId: run.id };
  }

  async pollRun(handle: RunHandle): Promise<RunPoll> {
    const run = await this.call('runs.retrieve', () =>
      this.client.beta.threads.runs.retrieve(handle.threadId, handle.runId));

    switch (run.status) {
      case 'queued':
        return { status: 'queued' };
      case 'in_progress':
      case 'cancelling':
        return { status: 'inProgress' };
      case 'completed':
        return { status: 'completed', output: await this.readReply(handle) };
      case 'requires_action':
        // No tools are registered with the run, so nothing can satisfy the action
        return { status: 'failed', error: 'run requires tool output' };
      default:
        return { status: 'failed', error: run.last_error?.message ?? `run ${run.status}` };
    }
  }

  async cancelRun(handle: RunHandle): Promise<void> {
    await this.call('runs.cancel', () =>
      this.client.beta.threads.runs.cancel(handle.threadId, handle.runId));
  }

  /**
   * Text of the assistant message produced by the run, citation markers removed.
   */
  private async readReply(handle: RunHandle): Promise<string> {
    const page = await this.call('messages.list', () =>
      this.client.beta.threads.messages.list(handle.threadId, { order: 'desc', limit: REPLY_LOOKBACK }));

    const reply = page.data.find((message) =>
      message.role === 'assistant' && (message.run_id === null || message.run_id === handle.runId));
    if (!reply) return '';

    return reply.content
      .flatMap((block) => {
        if (block.type !== 'text') return [];
        let value = block.text.value;
        for (const annotation of block.text.annotations) {
          value = value.split(annotation.text).join('');
        }
        return [value];
      })
      .join('\n\n');
  }
}
