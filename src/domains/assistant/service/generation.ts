/**
 * @fileoverview Reply generation through an assistant run.
 */

import type { AppLogger } from '../../../utils/observability/index.js';
import type { NormalizedDocument } from '../../pipeline/types.js';
import type { AssistantProvider, RemoteArtifact } from '../types.js';
import { waitForRun, type Clock, type PollPolicy } from './polling.js';

export type GenerationOptions = {
  assistantId: string;
  policy: PollPolicy;
  clock: Clock;
};

/**
 * Run the assistant on the document and block until it replies.
 *
 * @throws GenerationTimeoutError when polling runs out of attempts or time
 * @throws RemoteError on a failed run or provider error
 */
export async function generateReply(
  assistant: AssistantProvider,
  doc: NormalizedDocument,
  options: GenerationOptions,
  logger: AppLogger
): Promise<Extract<RemoteArtifact, { kind: 'draft' }>> {
  const handle = await assistant.createThreadRun(options.assistantId, doc.text);
  logger.info('generation_started', { messageId: doc.sourceId, runId: handle.runId });

  const body = await waitForRun(assistant, handle, options.policy, options.clock, logger);
  logger.info('generation_completed', { messageId: doc.sourceId, runId: handle.runId, replyLength: body.length });

  return { kind: 'draft', sourceId: doc.sourceId, body, runId: handle.runId };
}
