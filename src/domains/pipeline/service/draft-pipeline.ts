/**
 * @fileoverview Reply drafting pipeline.
 *
 * Inbox mail without a draft → thread context + signature stripped →
 * assistant run → reply draft. Mail is never sent.
 */

import type { AppConfig } from '../../../config.js';
import { AuthError, WriterConflictError } from '../../../utils/errors.js';
import type { AppLogger } from '../../../utils/observability/index.js';
import { generateReply } from '../../assistant/service/generation.js';
import { systemClock, type Clock, type PollPolicy } from '../../assistant/service/polling.js';
import type { AssistantProvider } from '../../assistant/types.js';
import type { MailMessage, MailboxProvider } from '../../mailbox/types.js';
import type { CandidateOutcome, ProgressTracker, RunSummary } from '../types.js';
import { finalizeReply, normalizeForReply } from './normalizer.js';
import { runPipeline } from './runner.js';
import { selectReplyCandidates } from './selector.js';
import { createDraftWriter } from './writer.js';

export type DraftPipelineDeps = {
  config: AppConfig;
  mailbox: MailboxProvider;
  assistant: AssistantProvider;
  tracker: ProgressTracker;
  logger: AppLogger;
  clock?: Clock;
};

export function pollPolicyFrom(config: AppConfig): PollPolicy {
  const { generation } = config;
  return {
    intervalMs: generation.pollIntervalMs,
    maxIntervalMs: generation.maxPollIntervalMs,
    maxAttempts: generation.maxAttempts,
    timeoutMs: generation.timeoutMs,
    backoff: generation.backoff,
  };
}

export async function runDraftPipeline(deps: DraftPipelineDeps): Promise<RunSummary> {
  const { config, mailbox, assistant, tracker, logger } = deps;
  const assistantId = config.openai.assistantId;
  if (!assistantId) {
    throw new Error('draft-replies needs ASSISTANT_ID; validateConfig was skipped');
  }

  const writer = createDraftWriter(mailbox, logger);
  const generation = { assistantId, policy: pollPolicyFrom(config), clock: deps.clock ?? systemClock };
  const { marker, text: signature } = config.signature;

  const handle = async (message: MailMessage): Promise<CandidateOutcome> => {
    if (!message.body.trim()) {
      logger.warn('candidate_skipped_empty', { messageId: message.id });
      return 'skipped';
    }

    const thread = await mailbox.getThread(message.threadId);
    const doc = normalizeForReply(message, thread, {
      marker,
      contextMessages: config.drafter.threadContextMessages,
    });

    const artifact = await generateReply(assistant, doc, generation, logger);
    const body = finalizeReply(artifact.body, marker, signature);

    try {
      await writer.createDraft(message, { ...artifact, body });
    } catch (error) {
      if (error instanceof WriterConflictError) {
        logger.info('draft_already_exists', { messageId: message.id, threadId: message.threadId });
        return 'conflict';
      }
      throw error;
    }

    if (config.drafter.markRead) {
      try {
        await mailbox.markRead(message.id);
      } catch (error) {
        if (error instanceof AuthError) throw error;
        logger.warn('mark_read_failed', {
          messageId: message.id,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
    return 'processed';
  };

  return runPipeline({
    pipeline: 'draft-replies',
    tracker,
    select: (watermark) => selectReplyCandidates(
      mailbox,
      watermark,
      { unreadOnly: config.drafter.unreadOnly },
      logger
    ),
    handle,
    logger,
  });
}
