/**
 * @fileoverview Vector-store ingestion of normalized documents.
 */

import { AppError, RemoteError } from '../../../utils/errors.js';
import type { AppLogger } from '../../../utils/observability/index.js';
import type { NormalizedDocument } from '../../pipeline/types.js';
import type { AssistantProvider, RemoteArtifact } from '../types.js';

/**
 * Upload the document as a file and attach it to the vector store.
 *
 * Both steps must succeed. When attaching fails the uploaded file is left
 * behind as an orphan; its id is logged and the error rethrown so the
 * message is retried on the next run.
 */
export async function ingestDocument(
  assistant: AssistantProvider,
  doc: NormalizedDocument,
  vectorStoreId: string,
  logger: AppLogger
): Promise<Extract<RemoteArtifact, { kind: 'file' }>> {
  const fileId = await assistant.uploadFile(doc.text, doc.filename);
  logger.info('file_uploaded', { messageId: doc.sourceId, fileId });

  try {
    await assistant.attachFile(vectorStoreId, fileId);
  } catch (error) {
    logger.warn('file_orphaned', {
      messageId: doc.sourceId,
      fileId,
      vectorStoreId,
      error: error instanceof Error ? error.message : String(error),
    });
    if (error instanceof AppError) throw error;
    throw new RemoteError(`attaching file ${fileId} failed`, { fileId, vectorStoreId });
  }

  logger.info('file_attached', { messageId: doc.sourceId, fileId, vectorStoreId });
  return { kind: 'file', sourceId: doc.sourceId, fileId };
}
