/**
 * @fileoverview Gmail message normalization.
 *
 * Turns a Gmail API message into a MailMessage: headers, receive time and a
 * plain-text body (text/plain preferred, stripped HTML as fallback).
 */

import type { gmail_v1 } from 'googleapis';
import type { MailMessage } from '../types.js';

/**
 * Normalize a full-format Gmail message.
 *
 * @throws Error when the API returned a message without an id
 */
export function toMailMessage(message: gmail_v1.Schema$Message): MailMessage {
  if (!message.id) {
    throw new Error('Gmail API returned a message without an id');
  }

  const headers = message.payload?.headers ?? [];
  const getHeader = (name: string): string =>
    headers.find(h => h.name?.toLowerCase() === name.toLowerCase())?.value ?? '';

  return {
    id: message.id,
    threadId: message.threadId || message.id,
    labelIds: message.labelIds ?? [],
    from: getHeader('From'),
    to: getHeader('To'),
    replyTo: getHeader('Reply-To'),
    subject: getHeader('Subject'),
    body: extractBody(message.payload),
    timestamp: resolveTimestamp(message.internalDate, getHeader('Date')),
    rfcMessageId: getHeader('Message-ID'),
    references: getHeader('References'),
  };
}

/**
 * Gmail's internalDate (ms since epoch, as a string) is authoritative;
 * the Date header is a fallback for messages imported without one.
 */
function resolveTimestamp(internalDate: string | null | undefined, dateHeader: string): number {
  const internal = Number(internalDate);
  if (internalDate && Number.isFinite(internal)) {
    return internal;
  }
  const parsed = Date.parse(dateHeader);
  return Number.isNaN(parsed) ? 0 : parsed;
}

/**
 * Walk MIME parts to extract body text.
 * Prefers text/plain over text/html; attachments are ignored.
 */
export function extractBody(payload: gmail_v1.Schema$MessagePart | undefined | null): string {
  let plainText = '';
  let htmlText = '';

  if (!payload) {
    return '';
  }

  function walkParts(part: gmail_v1.Schema$MessagePart): void {
    const mimeType = part.mimeType ?? '';
    const bodyData = part.body?.data;
    const isAttachment = Boolean(part.filename);

    if (mimeType === 'text/plain' && bodyData && !isAttachment) {
      plainText += decodeBodyData(bodyData);
    } else if (mimeType === 'text/html' && bodyData && !isAttachment) {
      htmlText += decodeBodyData(bodyData);
    }

    if (part.parts) {
      for (const child of part.parts) {
        walkParts(child);
      }
    }
  }

  walkParts(payload);

  if (plainText) return normalizeNewlines(plainText);
  if (htmlText) return normalizeNewlines(htmlToText(htmlText));

  // Single-part message with an unusual content type
  if (payload.body?.data) {
    return normalizeNewlines(decodeBodyData(payload.body.data));
  }
  return '';
}

/**
 * Decode base64url-encoded body data from Gmail API.
 */
function decodeBodyData(data: string): string {
  return Buffer.from(data, 'base64url').toString('utf-8');
}

/**
 * Reduce HTML to text: line breaks and block ends become newlines,
 * remaining tags are dropped, common entities decoded.
 */
export function htmlToText(html: string): string {
  if (!html) return '';

  return html
    .replace(/<(style|script)[^>]*>[\s\S]*?<\/\1>/gi, '')
    .replace(/<br\s*\/?>/gi, '\n')
    .replace(/<\/(p|div|li|tr|h[1-6])>/gi, '\n')
    .replace(/<[^>]+>/g, '')
    .replace(/&nbsp;/gi, ' ')
    .replace(/&lt;/gi, '<')
    .replace(/&gt;/gi, '>')
    .replace(/&quot;/gi, '"')
    .replace(/&#39;/gi, "'")
    .replace(/&amp;/gi, '&');
}

function normalizeNewlines(text: string): string {
  return text.replace(/\r\n/g, '\n');
}
