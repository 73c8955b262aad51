/**
 * @fileoverview Assistant domain types.
 *
 * AssistantProvider is the capability set the pipelines need from the
 * generative provider: file ingestion into a vector store and assistant runs.
 */

/** Provider-neutral run status */
export type RunStatus = 'queued' | 'inProgress' | 'completed' | 'failed';

export type RunHandle = {
  threadId: string;
  runId: string;
};

export type RunPoll = {
  status: RunStatus;
  /** Latest assistant reply, present once the run completed */
  output?: string;
  /** Provider-side failure reason, when the run failed */
  error?: string;
};

export interface AssistantProvider {
  /** Upload text as a file; returns the file id. */
  uploadFile(text: string, filename: string): Promise<string>;
  attachFile(vectorStoreId: string, fileId: string): Promise<void>;
  /** Start a new thread with `input` as the user message and run the assistant on it. */
  createThreadRun(assistantId: string, input: string): Promise<RunHandle>;
  pollRun(handle: RunHandle): Promise<RunPoll>;
  /** Ask the provider to stop a run that is still queued or in progress. */
  cancelRun(handle: RunHandle): Promise<void>;
}

/** Result of a successful remote call */
export type RemoteArtifact =
  | { kind: 'file'; sourceId: string; fileId: string }
  | { kind: 'draft'; sourceId: string; body: string; runId: string };
