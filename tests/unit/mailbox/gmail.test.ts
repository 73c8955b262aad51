/**
 * Unit tests for the Gmail mailbox provider.
 *
 * The googleapis client is replaced with a hand-built object exposing only
 * the endpoints the provider calls.
 */

import type { gmail_v1 } from 'googleapis';
import { describe, expect, it, vi } from 'vitest';
import { buildSearchQuery, GmailMailbox } from '../../../src/domains/mailbox/providers/gmail.js';
import type { MailMessage } from '../../../src/domains/mailbox/types.js';
import { AuthError, TransientProviderError } from '../../../src/utils/errors.js';
import { createTestLogger, type TestLogger } from '../../helpers/logger.js';

const encode = (text: string) => Buffer.from(text, 'utf-8').toString('base64url');

function apiMessage(id: string, options: { threadId?: string; internalDate?: number; labelIds?: string[] } = {}): gmail_v1.Schema$Message {
  return {
    id,
    threadId: options.threadId ?? 'thread-1',
    labelIds: options.labelIds ?? ['INBOX'],
    internalDate: String(options.internalDate ?? 1_700_000_000_000),
    payload: {
      mimeType: 'text/plain',
      headers: [
        { name: 'From', value: 'Dana Client <dana@example.com>' },
        { name: 'Subject', value: `Subject ${id}` },
      ],
      body: { data: encode(`Body ${id}`) },
    },
  };
}

function httpError(status: number, message: string): Error {
  return Object.assign(new Error(message), { code: status });
}

function createFakeGmail() {
  const mocks = {
    list: vi.fn(async (_params: gmail_v1.Params$Resource$Users$Messages$List): Promise<{ data: gmail_v1.Schema$ListMessagesResponse }> => ({ data: {} })),
    get: vi.fn(async (params: gmail_v1.Params$Resource$Users$Messages$Get): Promise<{ data: gmail_v1.Schema$Message }> => ({
      data: apiMessage(params.id ?? 'unknown'),
    })),
    threadsGet: vi.fn(async (_params: gmail_v1.Params$Resource$Users$Threads$Get): Promise<{ data: gmail_v1.Schema$Thread }> => ({ data: {} })),
    draftsCreate: vi.fn(async (_params: gmail_v1.Params$Resource$Users$Drafts$Create): Promise<{ data: gmail_v1.Schema$Draft }> => ({
      data: { id: 'r-draft-1' },
    })),
    modify: vi.fn(async (_params: gmail_v1.Params$Resource$Users$Messages$Modify): Promise<{ data: gmail_v1.Schema$Message }> => ({ data: {} })),
  };
  const gmail = {
    users: {
      messages: { list: mocks.list, get: mocks.get, modify: mocks.modify },
      threads: { get: mocks.threadsGet },
      drafts: { create: mocks.draftsCreate },
    },
  };
  return { mocks, gmail: gmail as unknown as gmail_v1.Gmail };
}

function createMailbox(): { mocks: ReturnType<typeof createFakeGmail>['mocks']; mailbox: GmailMailbox; logger: TestLogger } {
  const { mocks, gmail } = createFakeGmail();
  const logger = createTestLogger();
  return { mocks, mailbox: new GmailMailbox(gmail, logger, 0), logger };
}

async function collect(messages: AsyncIterable<MailMessage>): Promise<string[]> {
  const ids: string[] = [];
  for await (const message of messages) ids.push(message.id);
  return ids;
}

describe('buildSearchQuery', () => {
  it('combines inbox, unread and time bounds', () => {
    expect(buildSearchQuery({ inInbox: true, unreadOnly: true, after: 1_700_000_000_999 })).toBe('in:inbox is:unread after:1700000000');
  });

  it('is empty without constraints', () => {
    expect(buildSearchQuery({ labelIds: ['Label_1'] })).toBe('');
    expect(buildSearchQuery({ after: 0 })).toBe('');
  });
});

describe('GmailMailbox', () => {
  it('pages through search results and fetches each message', async () => {
    const { mocks, mailbox } = createMailbox();
    mocks.list
      .mockResolvedValueOnce({ data: { messages: [{ id: 'a' }, { id: 'b' }], nextPageToken: 'page-2' } })
      .mockResolvedValueOnce({ data: { messages: [{ id: 'c' }] } });

    const ids = await collect(mailbox.listMessages({ labelIds: ['Label_1'], after: 1_700_000_000_000 }));

    expect(ids).toEqual(['a', 'b', 'c']);
    expect(mocks.list).toHaveBeenNthCalledWith(1, {
      userId: 'me',
      q: 'after:1700000000',
      labelIds: ['Label_1'],
      pageToken: undefined,
    });
    expect(mocks.list).toHaveBeenNthCalledWith(2, expect.objectContaining({ pageToken: 'page-2' }));
    expect(mocks.get).toHaveBeenCalledWith({ userId: 'me', id: 'c', format: 'full' });
  });

  it('skips a listed message that is gone by the time it is fetched', async () => {
    const { mocks, mailbox, logger } = createMailbox();
    mocks.list.mockResolvedValueOnce({ data: { messages: [{ id: 'a' }, { id: 'gone' }, { id: 'c' }] } });
    mocks.get.mockImplementation(async (params) => {
      if (params.id === 'gone') throw httpError(404, 'Requested entity was not found.');
      return { data: apiMessage(params.id ?? 'unknown') };
    });

    const ids = await collect(mailbox.listMessages({ inInbox: true }));

    expect(ids).toEqual(['a', 'c']);
    expect(mocks.get).toHaveBeenCalledTimes(3);
    expect(logger.eventsNamed('message_vanished').map((e) => e.data.messageId)).toEqual(['gone']);
  });

  it('still stops listing on other fetch failures', async () => {
    const { mocks, mailbox } = createMailbox();
    mocks.list.mockResolvedValueOnce({ data: { messages: [{ id: 'a' }, { id: 'b' }] } });
    mocks.get.mockRejectedValue(httpError(500, 'Backend Error'));

    await expect(collect(mailbox.listMessages({ inInbox: true }))).rejects.toBeInstanceOf(TransientProviderError);
  });

  it('returns a thread oldest first without drafts', async () => {
    const { mocks, mailbox } = createMailbox();
    mocks.threadsGet.mockResolvedValueOnce({
      data: {
        messages: [
          apiMessage('later', { internalDate: 2_000 }),
          apiMessage('draft', { internalDate: 3_000, labelIds: ['DRAFT'] }),
          apiMessage('earlier', { internalDate: 1_000 }),
        ],
      },
    });

    const thread = await mailbox.getThread('thread-1');

    expect(thread.map((m) => m.id)).toEqual(['earlier', 'later']);
    expect(mocks.threadsGet).toHaveBeenCalledWith({ userId: 'me', id: 'thread-1', format: 'full' });
  });

  it('detects a draft in the thread', async () => {
    const { mocks, mailbox } = createMailbox();
    mocks.threadsGet
      .mockResolvedValueOnce({ data: { messages: [{ id: 'a', labelIds: ['INBOX'] }, { id: 'd', labelIds: ['DRAFT'] }] } })
      .mockResolvedValueOnce({ data: { messages: [{ id: 'a', labelIds: ['INBOX'] }] } });

    await expect(mailbox.hasExistingDraft('thread-1')).resolves.toBe(true);
    await expect(mailbox.hasExistingDraft('thread-2')).resolves.toBe(false);
    expect(mocks.threadsGet).toHaveBeenCalledWith({ userId: 'me', id: 'thread-1', format: 'minimal' });
  });

  it('creates a draft in the thread', async () => {
    const { mocks, mailbox } = createMailbox();

    const id = await mailbox.createDraft({
      threadId: 'thread-1',
      to: 'dana@example.com',
      subject: 'Re: Plans',
      body: 'Sounds good.',
      inReplyTo: '<a@mail.example.com>',
    });

    expect(id).toBe('r-draft-1');
    const [params] = mocks.draftsCreate.mock.calls[0];
    expect(params.userId).toBe('me');
    expect(params.requestBody?.message?.threadId).toBe('thread-1');
    const lines = Buffer.from(params.requestBody?.message?.raw ?? '', 'base64url').toString('utf-8').split(/\r?\n/);
    expect(lines).toContain('In-Reply-To: <a@mail.example.com>');
    expect(lines.find((line) => line.startsWith('To: '))).toContain('dana@example.com');
  });

  it('rejects a draft response without an id', async () => {
    const { mocks, mailbox } = createMailbox();
    mocks.draftsCreate.mockResolvedValueOnce({ data: {} });

    await expect(mailbox.createDraft({ threadId: 't', to: 'a@example.com', subject: 'Re:', body: 'x' }))
      .rejects.toBeInstanceOf(TransientProviderError);
  });

  it('removes labels and marks messages read', async () => {
    const { mocks, mailbox } = createMailbox();

    await mailbox.removeLabel('m1', 'Label_1');
    await mailbox.markRead('m2');

    expect(mocks.modify).toHaveBeenNthCalledWith(1, { userId: 'me', id: 'm1', requestBody: { removeLabelIds: ['Label_1'] } });
    expect(mocks.modify).toHaveBeenNthCalledWith(2, { userId: 'me', id: 'm2', requestBody: { removeLabelIds: ['UNREAD'] } });
  });

  it('retries rate limits and server errors', async () => {
    const { mocks, mailbox, logger } = createMailbox();
    mocks.get
      .mockRejectedValueOnce(httpError(429, 'Rate Limit Exceeded'))
      .mockRejectedValueOnce(httpError(503, 'Backend Error'));

    const message = await mailbox.getMessage('m1');

    expect(message.id).toBe('m1');
    expect(mocks.get).toHaveBeenCalledTimes(3);
    expect(logger.eventsNamed('google_api_retry').map((e) => e.data.status)).toEqual([429, 503]);
  });

  it('gives up after the retry budget', async () => {
    const { mocks, mailbox } = createMailbox();
    mocks.get.mockRejectedValue(httpError(500, 'Backend Error'));

    const error = await mailbox.getMessage('m1').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransientProviderError);
    expect(error).toMatchObject({ status: 500 });
    expect(mocks.get).toHaveBeenCalledTimes(3);
  });

  it('maps rejected credentials to AuthError without retrying', async () => {
    const { mocks, mailbox } = createMailbox();
    mocks.list.mockRejectedValueOnce(httpError(401, 'Invalid Credentials'));

    await expect(collect(mailbox.listMessages({ inInbox: true }))).rejects.toBeInstanceOf(AuthError);
    expect(mocks.list).toHaveBeenCalledTimes(1);
  });

  it('does not retry client errors', async () => {
    const { mocks, mailbox } = createMailbox();
    mocks.threadsGet.mockRejectedValueOnce(httpError(404, 'Not Found'));

    await expect(mailbox.getThread('gone')).rejects.toMatchObject({ status: 404, code: 'PROVIDER_TRANSIENT' });
    expect(mocks.threadsGet).toHaveBeenCalledTimes(1);
  });
});
