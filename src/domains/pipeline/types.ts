/**
 * @fileoverview Pipeline type definitions.
 *
 * Shared types for selection, normalization, progress tracking and the run loop.
 */

export type PipelineName = 'index-sent' | 'draft-replies';

/** Text handed to the assistant, keyed by the source message id */
export type NormalizedDocument = {
  sourceId: string;
  kind: 'index' | 'reply';
  text: string;
  /** Upload filename for ingestion */
  filename: string;
};

/** Boundary of the newest resolved message */
export type Watermark = {
  timestamp: number;
  messageId: string;
};

/** Durable per-pipeline progress record */
export type ProcessingState = {
  lastProcessedTimestamp: number | null;
  lastProcessedMessageId: string | null;
  /** ISO time of the last write */
  updatedAt: string | null;
};

export interface ProgressTracker {
  /** Stored state, or the zero state on first run. */
  load(): Promise<ProcessingState>;
  /** Replace the stored state atomically. */
  save(state: ProcessingState): Promise<void>;
}

/**
 * How one candidate ended:
 * - processed: artifact written
 * - skipped: nothing to do (empty body), resolved for good
 * - conflict: the artifact already existed, resolved without writing
 * - failed: retry on a later run
 */
export type CandidateOutcome = 'processed' | 'skipped' | 'conflict' | 'failed';

export type RunSummary = {
  pipeline: PipelineName;
  total: number;
  processed: number;
  skipped: number;
  conflicts: number;
  failed: number;
  /** Selection stopped early on a provider error; state was not written */
  aborted: boolean;
  watermarkAdvanced: boolean;
  state: ProcessingState;
};
