/**
 * @fileoverview Mailbox domain types.
 *
 * MailMessage is the read-only record the pipelines work on. MailboxProvider
 * is the capability set the pipelines need from a mail provider; the Gmail
 * adapter implements it, tests use an in-memory fake.
 */

/** Message after fetch + body extraction */
export type MailMessage = {
  id: string;
  threadId: string;
  labelIds: string[];
  from: string;
  to: string;
  /** Reply-To header, empty when absent */
  replyTo: string;
  subject: string;
  /** Plain-text body */
  body: string;
  /** Provider receive time, ms since epoch */
  timestamp: number;
  /** RFC 822 Message-ID header, empty when absent */
  rfcMessageId: string;
  /** RFC 822 References header, empty when absent */
  references: string;
};

/** Provider-neutral selection filter */
export type MessageFilter = {
  /** Message must carry every listed label */
  labelIds?: string[];
  inInbox?: boolean;
  unreadOnly?: boolean;
  /** Only messages received after this instant (ms since epoch, second precision) */
  after?: number;
};

export type DraftInput = {
  threadId: string;
  to: string;
  subject: string;
  body: string;
  inReplyTo?: string;
  references?: string;
};

export interface MailboxProvider {
  /** Lazily list messages matching the filter in provider order. */
  listMessages(filter: MessageFilter): AsyncIterable<MailMessage>;
  getMessage(id: string): Promise<MailMessage>;
  /** Every message of the thread, drafts excluded, oldest first. */
  getThread(threadId: string): Promise<MailMessage[]>;
  hasExistingDraft(threadId: string): Promise<boolean>;
  /** Returns the provider's draft id. */
  createDraft(input: DraftInput): Promise<string>;
  removeLabel(messageId: string, labelId: string): Promise<void>;
  markRead(messageId: string): Promise<void>;
}
