/**
 * @fileoverview Generic pipeline run loop.
 *
 * load state → select → handle each candidate in order → save state once.
 *
 * Per-candidate failures are logged and the run continues. AuthError ends the
 * run immediately and propagates. Any other error raised while selecting ends
 * the run without touching the stored state.
 */

import { AuthError, StateSaveError } from '../../../utils/errors.js';
import type { AppLogger } from '../../../utils/observability/index.js';
import type { MailMessage } from '../../mailbox/types.js';
import type {
  CandidateOutcome,
  PipelineName,
  ProgressTracker,
  RunSummary,
  Watermark,
} from '../types.js';
import { advanceWatermark, toWatermark } from './watermark.js';

export type CandidateHandler = (message: MailMessage) => Promise<CandidateOutcome>;

export type PipelineRun = {
  pipeline: PipelineName;
  tracker: ProgressTracker;
  select: (watermark: Watermark | null) => AsyncIterable<MailMessage>;
  handle: CandidateHandler;
  logger: AppLogger;
  now?: () => Date;
};

export async function runPipeline(run: PipelineRun): Promise<RunSummary> {
  const { pipeline, tracker, logger } = run;
  const now = run.now ?? (() => new Date());

  const prior = await tracker.load();
  const watermark = toWatermark(prior);
  logger.info('run_started', {
    lastProcessedTimestamp: prior.lastProcessedTimestamp,
    lastProcessedMessageId: prior.lastProcessedMessageId,
  });

  const summary: RunSummary = {
    pipeline,
    total: 0,
    processed: 0,
    skipped: 0,
    conflicts: 0,
    failed: 0,
    aborted: false,
    watermarkAdvanced: false,
    state: prior,
  };
  const resolved: Watermark[] = [];
  const failed: Watermark[] = [];

  try {
    for await (const message of run.select(watermark)) {
      summary.total++;
      const mark: Watermark = { timestamp: message.timestamp, messageId: message.id };
      const outcome = await handleCandidate(run.handle, message, logger);

      switch (outcome) {
        case 'processed':
          summary.processed++;
          break;
        case 'skipped':
          summary.skipped++;
          break;
        case 'conflict':
          summary.conflicts++;
          break;
        case 'failed':
          summary.failed++;
          break;
      }
      (outcome === 'failed' ? failed : resolved).push(mark);
    }
  } catch (error) {
    if (error instanceof AuthError) throw error;
    summary.aborted = true;
    logger.error('run_aborted', {
      error: error instanceof Error ? error.message : String(error),
      attempted: summary.total,
    });
    logSummary(logger, summary);
    return summary;
  }

  const next = advanceWatermark(watermark, resolved, failed);
  if (next) {
    summary.state = {
      lastProcessedTimestamp: next.timestamp,
      lastProcessedMessageId: next.messageId,
      updatedAt: now().toISOString(),
    };
    try {
      await tracker.save(summary.state);
    } catch (error) {
      throw new StateSaveError(pipeline, error instanceof Error ? error.message : String(error));
    }
    summary.watermarkAdvanced = true;
  }

  logSummary(logger, summary);
  return summary;
}

async function handleCandidate(
  handle: CandidateHandler,
  message: MailMessage,
  logger: AppLogger
): Promise<CandidateOutcome> {
  try {
    return await handle(message);
  } catch (error) {
    if (error instanceof AuthError) throw error;
    logger.error('candidate_failed', {
      messageId: message.id,
      threadId: message.threadId,
      errorName: error instanceof Error ? error.name : 'Error',
      error: error instanceof Error ? error.message : String(error),
    });
    return 'failed';
  }
}

function logSummary(logger: AppLogger, summary: RunSummary): void {
  logger.info('run_completed', {
    total: summary.total,
    processed: summary.processed,
    skipped: summary.skipped,
    conflicts: summary.conflicts,
    failed: summary.failed,
    aborted: summary.aborted,
    watermarkAdvanced: summary.watermarkAdvanced,
    lastProcessedTimestamp: summary.state.lastProcessedTimestamp,
  });
}
