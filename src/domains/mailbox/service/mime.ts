/**
 * @fileoverview RFC 822 reply construction for Gmail drafts.
 */

import { createMimeMessage } from 'mimetext';
import type { DraftInput, MailMessage } from '../types.js';

export type ParsedAddress = {
  name?: string;
  addr: string;
};

/**
 * Split a single `Name <addr>` header value. A bare address comes back
 * without a name.
 */
export function parseAddress(value: string): ParsedAddress {
  const match = value.trim().match(/^(.*?)\s*<([^<>]+)>$/);
  if (!match) return { addr: value.trim() };

  const name = match[1].trim().replace(/^"(.*)"$/, '$1');
  return name ? { name, addr: match[2].trim() } : { addr: match[2].trim() };
}

/** Prefix a subject with `Re:` unless it already has one. */
export function replySubject(subject: string): string {
  const trimmed = subject.trim();
  if (/^re:/i.test(trimmed)) return trimmed;
  return trimmed ? `Re: ${trimmed}` : 'Re:';
}

/**
 * Address and thread a reply to a message.
 */
export function buildReplyDraft(message: MailMessage, body: string): DraftInput {
  const references = [message.references, message.rfcMessageId]
    .filter(Boolean)
    .join(' ');

  return {
    threadId: message.threadId,
    to: message.replyTo || message.from,
    subject: replySubject(message.subject),
    body,
    inReplyTo: message.rfcMessageId || undefined,
    references: references || undefined,
  };
}

/**
 * Build the raw message Gmail expects in `drafts.create`, base64url encoded.
 * Gmail fills in the sender for the authenticated account ('me').
 */
export function buildRawReply(draft: DraftInput): string {
  const msg = createMimeMessage();
  msg.setSender('me');
  msg.setRecipients([parseAddress(draft.to)]);
  msg.setSubject(draft.subject);
  msg.addMessage({ contentType: 'text/plain', data: draft.body });

  if (draft.inReplyTo) msg.setHeader('In-Reply-To', draft.inReplyTo);
  if (draft.references) msg.setHeader('References', draft.references);

  return msg.asEncoded();
}
