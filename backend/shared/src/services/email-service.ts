import { SESClient, SendEmailCommand } from '@aws-sdk/client-ses';
import { EmailLogStore } from '../repositories/stores';
import { EmailLog, EmailStatus, MessageGuard, NotificationMessage } from '../types';
import { generateId, getCurrentTimestamp } from '../utils/dynamodb-client';
import { logger } from '../utils/logger';

/**
 * Email Service
 * Consumes notification messages and sends them via Amazon SES, keeping an
 * e-mail log per message.
 */

// Cache SES client
let sesClient: SESClient | null = null;

/**
 * Get or create SES client
 */
function getSESClient(): SESClient {
  if (!sesClient) {
    sesClient = new SESClient({
      region: process.env.AWS_REGION || 'us-east-2',
    });
  }
  return sesClient;
}

export interface OutgoingEmail {
  to: string;
  subject: string;
  textBody: string;
  htmlBody: string;
}

export interface EmailSender {
  send(email: OutgoingEmail): Promise<void>;
}

export class SesEmailSender implements EmailSender {
  constructor(private readonly fromEmail: string) {}

  async send(email: OutgoingEmail): Promise<void> {
    await getSESClient().send(
      new SendEmailCommand({
        Source: this.fromEmail,
        Destination: {
          ToAddresses: [email.to],
        },
        Message: {
          Subject: {
            Data: email.subject,
            Charset: 'UTF-8',
          },
          Body: {
            Html: {
              Data: email.htmlBody,
              Charset: 'UTF-8',
            },
            Text: {
              Data: email.textBody,
              Charset: 'UTF-8',
            },
          },
        },
      })
    );
  }
}

function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

/**
 * Generate HTML email from the plain-text body, one paragraph per blank line
 */
export function renderHtml(subject: string, body: string): string {
  const paragraphs = body
    .split(/\n{2,}/)
    .map((paragraph) => `<p style="margin: 0 0 16px; font-size: 16px; color: #374151;">${escapeHtml(paragraph)}</p>`)
    .join('\n');

  return `<!DOCTYPE html>
<html>
<head>
  <meta charset="UTF-8">
  <title>${escapeHtml(subject)}</title>
</head>
<body style="margin: 0; padding: 32px; font-family: Arial, sans-serif; background-color: #f3f4f6;">
${paragraphs}
</body>
</html>`;
}

export class NotificationService {
  constructor(
    private readonly emailLog: EmailLogStore,
    private readonly sender: EmailSender
  ) {}

  /**
   * Log the e-mail together with the message's idempotency record, then send.
   * A send failure marks the log FAILED; the message is not redelivered, so
   * a customer never receives the same e-mail twice.
   */
  async deliver(message: NotificationMessage, guard: MessageGuard): Promise<EmailLog> {
    const email: EmailLog = {
      emailId: generateId(),
      messageId: message.eventId,
      orderId: message.orderId,
      type: message.type,
      recipient: message.recipient,
      subject: message.subject,
      body: message.body,
      status: EmailStatus.PENDING,
      createdAt: getCurrentTimestamp(),
    };

    await this.emailLog.create(email, guard);

    try {
      await this.sender.send({
        to: message.recipient,
        subject: message.subject,
        textBody: message.body,
        htmlBody: renderHtml(message.subject, message.body),
      });
    } catch (error) {
      logger.error('Failed to send email via SES', error, {
        emailId: email.emailId,
        orderId: message.orderId,
        type: message.type,
      });
      await this.emailLog.updateStatus(email.emailId, EmailStatus.FAILED);
      return { ...email, status: EmailStatus.FAILED };
    }

    const sentAt = getCurrentTimestamp();
    await this.emailLog.updateStatus(email.emailId, EmailStatus.SENT, sentAt);
    logger.info('Notification email sent', { orderId: message.orderId, type: message.type });
    return { ...email, status: EmailStatus.SENT, sentAt };
  }
}
