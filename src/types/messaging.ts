/**
 * Transport a message travelled on. `imessage` carries delivery/read receipts,
 * `sms` does not.
 */
export type ChannelKind = 'imessage' | 'sms';

/** A file attached to an inbound message, resolved from the `attachment` table. */
export interface Attachment {
  /** Base name of the stored file. */
  filename: string;
  /** Path on disk with the `~` prefix expanded. */
  absolutePath: string;
  mimeType: string;
  sizeBytes: number;
  /** Original file name shown to the user, when the store kept one. */
  transferName: string | null;
}

/** A normalized row of the Messages store. */
export interface InboundMessage {
  /** `message.ROWID`. */
  readonly id: number;
  /** `message.guid`. */
  readonly externalId: string;
  /** Normalized sender handle (E.164 or email). */
  readonly sender: string;
  /** Message text; empty only for attachment-only messages. */
  readonly body: string;
  readonly receivedAt: Date;
  readonly isOwnMessage: boolean;
  readonly channelKind: ChannelKind;
  readonly attachments: readonly Attachment[];
}

export function isImageAttachment(attachment: Attachment): boolean {
  return attachment.mimeType.startsWith('image/');
}

/** Outcome of a send attempt through the Messages app. */
export type SendResult =
  | { status: 'success' }
  | { status: 'failed'; reason: string }
  | { status: 'invalid_recipient'; reason: string };

/** Contract of the component that actually hands a message to Messages. */
export interface SendCapability {
  send(phone: string, text: string): Promise<SendResult>;
}

/** Response body of the `/send` endpoint. */
export interface SendResponse {
  success: boolean;
  messageId?: string;
  error?: string;
}

export type StatusKind = 'delivered' | 'read';

/** A newly observed receipt for a tracked outbound message. */
export interface StatusUpdate {
  externalId: string;
  recipient: string;
  kind: StatusKind;
  timestamp: Date;
  channelKind: ChannelKind;
}

/** A sent message waiting to be bound to its store row and its receipts. */
export interface TrackedOutbound {
  recipient: string;
  bodyText: string;
  sentAt: Date;
  channelKind: ChannelKind;
  resolvedExternalId: string | null;
  deliveredAt: Date | null;
  readAt: Date | null;
}

export type MessageCallback = (message: InboundMessage) => Promise<void> | void;
export type StatusCallback = (update: StatusUpdate) => Promise<void> | void;

/** Shared contract of the chat.db watcher and its in-memory double. */
export interface MessageWatcher {
  start(skipHistorical?: boolean): void;
  stop(): Promise<void>;
  readonly isRunning: boolean;
  readonly lastCursor: number;
}
