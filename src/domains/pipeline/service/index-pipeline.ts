/**
 * @fileoverview Sent-mail indexing pipeline.
 *
 * Labeled sent mail → signature stripped → uploaded and attached to the
 * vector store → recorded.
 */

import type { AppConfig } from '../../../config.js';
import type { AppLogger } from '../../../utils/observability/index.js';
import { ingestDocument } from '../../assistant/service/ingestion.js';
import type { AssistantProvider } from '../../assistant/types.js';
import type { MailMessage, MailboxProvider } from '../../mailbox/types.js';
import type { CandidateOutcome, ProgressTracker, RunSummary } from '../types.js';
import { normalizeForIndex } from './normalizer.js';
import { runPipeline } from './runner.js';
import { selectIndexCandidates } from './selector.js';
import { createIndexWriter } from './writer.js';

export type IndexPipelineDeps = {
  config: AppConfig;
  mailbox: MailboxProvider;
  assistant: AssistantProvider;
  tracker: ProgressTracker;
  logger: AppLogger;
};

export async function runIndexPipeline(deps: IndexPipelineDeps): Promise<RunSummary> {
  const { config, mailbox, assistant, tracker, logger } = deps;
  const labelId = config.gmail.labelId;
  const vectorStoreId = config.openai.vectorStoreId;
  if (!labelId || !vectorStoreId) {
    throw new Error('index-sent needs GMAIL_LABEL_ID and VECTOR_STORE_ID; validateConfig was skipped');
  }

  const writer = createIndexWriter(mailbox, { labelId, removeLabel: config.indexer.removeLabel }, logger);

  const handle = async (message: MailMessage): Promise<CandidateOutcome> => {
    const doc = normalizeForIndex(message, config.signature.marker);
    if (!doc.text.trim()) {
      logger.warn('candidate_skipped_empty', { messageId: message.id });
      return 'skipped';
    }

    await ingestDocument(assistant, doc, vectorStoreId, logger);
    await writer.recordIndexed(message);
    return 'processed';
  };

  return runPipeline({
    pipeline: 'index-sent',
    tracker,
    select: (watermark) => selectIndexCandidates(mailbox, labelId, watermark),
    handle,
    logger,
  });
}
