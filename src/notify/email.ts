/**
 * Outbound email with a single text attachment, sent through nodemailer.
 */

import { createTransport, type SendMailOptions } from 'nodemailer';
import { createChildLogger } from '@/utils/logger';

const logger = createChildLogger('email');

export interface EmailAttachment {
  filename: string;
  content: string;
  contentType: string;
}

export interface EmailMessage {
  from: string;
  to: string;
  subject: string;
  text: string;
  attachments: EmailAttachment[];
}

export interface EmailSender {
  /** Resolves with the transport's message id; rejects when delivery fails. */
  send(message: EmailMessage): Promise<string | null>;
}

export interface MailTransport {
  sendMail(mail: SendMailOptions): Promise<{ messageId?: string }>;
}

export class NodemailerEmailSender implements EmailSender {
  constructor(private readonly transport: MailTransport) {}

  async send(message: EmailMessage): Promise<string | null> {
    const info = await this.transport.sendMail({
      from: message.from,
      to: message.to,
      subject: message.subject,
      text: message.text,
      attachments: message.attachments.map((attachment) => ({
        filename: attachment.filename,
        content: attachment.content,
        contentType: attachment.contentType,
      })),
    });
    logger.info({ to: message.to, messageId: info.messageId }, 'Email sent');
    return info.messageId ?? null;
  }
}

export function createSmtpEmailSender(smtpUrl: string): NodemailerEmailSender {
  return new NodemailerEmailSender(createTransport(smtpUrl));
}

/** Renders messages as JSON instead of delivering them. */
export function createJsonEmailSender(): NodemailerEmailSender {
  return new NodemailerEmailSender(createTransport({ jsonTransport: true }));
}
