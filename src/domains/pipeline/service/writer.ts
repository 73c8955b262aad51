/**
 * @fileoverview Mailbox-side write-back for both pipelines.
 */

import { AuthError, WriterConflictError } from '../../../utils/errors.js';
import type { AppLogger } from '../../../utils/observability/index.js';
import type { RemoteArtifact } from '../../assistant/types.js';
import { buildReplyDraft } from '../../mailbox/service/mime.js';
import type { MailMessage, MailboxProvider } from '../../mailbox/types.js';

export interface IndexWriter {
  /** Mark the message as contributed to the vector store. */
  recordIndexed(message: MailMessage): Promise<void>;
}

export interface DraftWriter {
  /**
   * Create the reply draft and return its id.
   *
   * @throws WriterConflictError when the thread already has a draft
   */
  createDraft(message: MailMessage, artifact: Extract<RemoteArtifact, { kind: 'draft' }>): Promise<string>;
}

export type IndexWriterOptions = {
  labelId: string;
  /** Remove the indexing label once the message is in the vector store */
  removeLabel: boolean;
};

/**
 * The watermark alone prevents resubmission, so recording is a log line
 * unless label removal is enabled. A failed removal is only a warning:
 * the message is already indexed.
 */
export function createIndexWriter(
  mailbox: MailboxProvider,
  options: IndexWriterOptions,
  logger: AppLogger
): IndexWriter {
  return {
    async recordIndexed(message: MailMessage): Promise<void> {
      logger.info('message_indexed', { messageId: message.id });
      if (!options.removeLabel) return;

      try {
        await mailbox.removeLabel(message.id, options.labelId);
        logger.info('label_removed', { messageId: message.id, labelId: options.labelId });
      } catch (error) {
        if (error instanceof AuthError) throw error;
        logger.warn('label_remove_failed', {
          messageId: message.id,
          labelId: options.labelId,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    },
  };
}

/**
 * Checks for an existing draft immediately before creating one, which covers
 * drafts made after selection (by an earlier candidate of the same thread
 * or by hand).
 */
export function createDraftWriter(mailbox: MailboxProvider, logger: AppLogger): DraftWriter {
  return {
    async createDraft(message, artifact): Promise<string> {
      if (await mailbox.hasExistingDraft(message.threadId)) {
        throw new WriterConflictError(message.threadId);
      }

      const draftId = await mailbox.createDraft(buildReplyDraft(message, artifact.body));
      logger.info('draft_created', { messageId: message.id, threadId: message.threadId, draftId });
      return draftId;
    },
  };
}
