/**
 * @fileoverview Message normalization for the assistant.
 *
 * Signature removal, thread context for replies, and clean-up of the
 * assistant's output before it becomes a draft.
 */

import type { MailMessage } from '../../mailbox/types.js';
import type { NormalizedDocument } from '../types.js';

/** Longest body kept for each thread-context message */
const CONTEXT_BODY_LIMIT = 2000;

/**
 * Cut the body at the first line equal to the signature marker.
 *
 * Trailing whitespace on the line is ignored, so the conventional `"-- "`
 * delimiter matches a `"--"` marker. The marker line and everything after it
 * are dropped; text before it is returned untouched. No marker, no change.
 */
export function stripSignature(body: string, marker: string): string {
  const wanted = marker.trim();
  if (!wanted) return body;

  let offset = 0;
  for (const line of body.split('\n')) {
    if (line.trimEnd() === wanted) {
      return body.slice(0, offset);
    }
    offset += line.length + 1;
  }
  return body;
}

export function normalizeForIndex(message: MailMessage, marker: string): NormalizedDocument {
  return {
    sourceId: message.id,
    kind: 'index',
    text: stripSignature(message.body, marker),
    filename: `email-${message.id}.txt`,
  };
}

export type ReplyNormalizeOptions = {
  marker: string;
  /** Earlier thread messages to include, newest first */
  contextMessages: number;
};

function truncate(text: string, limit: number): string {
  return text.length <= limit ? text : `${text.slice(0, limit)}\n[...]`;
}

function formatMessage(message: MailMessage, body: string): string {
  const date = message.timestamp > 0 ? new Date(message.timestamp).toISOString() : 'unknown';
  return `From: ${message.from}\nDate: ${date}\nSubject: ${message.subject}\n\n${body.trim()}`;
}

/**
 * Build the assistant input for a reply: earlier thread messages (most
 * recent first) followed by the message to answer.
 */
export function normalizeForReply(
  message: MailMessage,
  thread: MailMessage[],
  options: ReplyNormalizeOptions
): NormalizedDocument {
  const earlier = thread
    .filter((m) => m.id !== message.id && m.timestamp <= message.timestamp)
    .sort((a, b) => b.timestamp - a.timestamp)
    .slice(0, options.contextMessages);

  const sections: string[] = [];
  if (earlier.length > 0) {
    const context = earlier
      .map((m) => formatMessage(m, truncate(stripSignature(m.body, options.marker), CONTEXT_BODY_LIMIT)))
      .join('\n\n---\n\n');
    sections.push(`Earlier messages in this thread, most recent first:\n\n${context}`);
  }
  sections.push(`Write a reply to this email:\n\n${formatMessage(message, stripSignature(message.body, options.marker))}`);

  return {
    sourceId: message.id,
    kind: 'reply',
    text: sections.join('\n\n===\n\n'),
    filename: `reply-${message.id}.txt`,
  };
}

/**
 * Turn assistant output into a draft body: drop any signature the assistant
 * wrote and append the configured one.
 */
export function finalizeReply(output: string, marker: string, signature: string): string {
  const text = stripSignature(output, marker).trim();
  const sig = signature.trim();
  return sig ? `${text}\n\n${sig}` : text;
}
