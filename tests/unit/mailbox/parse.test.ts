/**
 * Unit tests for Gmail message normalization.
 */

import type { gmail_v1 } from 'googleapis';
import { describe, expect, it } from 'vitest';
import { extractBody, htmlToText, toMailMessage } from '../../../src/domains/mailbox/service/parse.js';

const encode = (text: string) => Buffer.from(text, 'utf-8').toString('base64url');

describe('toMailMessage', () => {
  const headers: gmail_v1.Schema$MessagePartHeader[] = [
    { name: 'From', value: 'Dana Client <dana@example.com>' },
    { name: 'To', value: 'me@example.com' },
    { name: 'reply-to', value: 'support@example.com' },
    { name: 'Subject', value: 'Invoice question' },
    { name: 'Date', value: 'Mon, 20 Jan 2025 10:00:00 +0000' },
    { name: 'Message-ID', value: '<abc@mail.example.com>' },
    { name: 'References', value: '<root@mail.example.com>' },
  ];

  it('maps headers, labels and body', () => {
    const message = toMailMessage({
      id: 'm1',
      threadId: 't1',
      labelIds: ['INBOX', 'UNREAD'],
      internalDate: '1737367200000',
      payload: { mimeType: 'text/plain', headers, body: { data: encode('Can you resend it?') } },
    });

    expect(message).toEqual({
      id: 'm1',
      threadId: 't1',
      labelIds: ['INBOX', 'UNREAD'],
      from: 'Dana Client <dana@example.com>',
      to: 'me@example.com',
      replyTo: 'support@example.com',
      subject: 'Invoice question',
      body: 'Can you resend it?',
      timestamp: 1737367200000,
      rfcMessageId: '<abc@mail.example.com>',
      references: '<root@mail.example.com>',
    });
  });

  it('falls back to the Date header without internalDate', () => {
    const message = toMailMessage({ id: 'm1', payload: { headers } });

    expect(message.timestamp).toBe(Date.UTC(2025, 0, 20, 10));
    expect(message.threadId).toBe('m1');
    expect(message.labelIds).toEqual([]);
  });

  it('uses zero when no time is known', () => {
    expect(toMailMessage({ id: 'm1' }).timestamp).toBe(0);
  });

  it('rejects a message without an id', () => {
    expect(() => toMailMessage({ threadId: 't1' })).toThrow('without an id');
  });
});

describe('extractBody', () => {
  it('prefers text/plain over html', () => {
    const body = extractBody({
      mimeType: 'multipart/alternative',
      parts: [
        { mimeType: 'text/plain', body: { data: encode('Plain version') } },
        { mimeType: 'text/html', body: { data: encode('<p>HTML version</p>') } },
      ],
    });

    expect(body).toBe('Plain version');
  });

  it('walks nested parts and skips attachments', () => {
    const body = extractBody({
      mimeType: 'multipart/mixed',
      parts: [
        {
          mimeType: 'multipart/alternative',
          parts: [{ mimeType: 'text/plain', body: { data: encode('Inline text\r\nSecond line') } }],
        },
        { mimeType: 'text/plain', filename: 'notes.txt', body: { data: encode('attachment text') } },
      ],
    });

    expect(body).toBe('Inline text\nSecond line');
  });

  it('converts html when there is no plain part', () => {
    const body = extractBody({
      mimeType: 'text/html',
      body: { data: encode('<p>Hello&nbsp;there</p><div>Terms &amp; conditions</div>') },
    });

    expect(body).toBe('Hello there\nTerms & conditions\n');
  });

  it('returns an empty string for a missing payload', () => {
    expect(extractBody(undefined)).toBe('');
  });

  it('reads the top-level body of an unusual content type', () => {
    expect(extractBody({ mimeType: 'text/calendar', body: { data: encode('BEGIN:VCALENDAR') } })).toBe('BEGIN:VCALENDAR');
  });
});

describe('htmlToText', () => {
  it('drops styles and scripts and turns breaks into newlines', () => {
    const html = '<style>p { color: red; }</style><script>track()</script>Hi<br>there<br/>&lt;ok&gt; &quot;yes&quot; it&#39;s';

    expect(htmlToText(html)).toBe('Hi\nthere\n<ok> "yes" it\'s');
  });

  it('decodes an escaped entity only once', () => {
    expect(htmlToText('&amp;lt;')).toBe('&lt;');
  });
});
