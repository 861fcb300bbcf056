/**
 * Notification mail sent to the account owner through Postmark templates.
 */

import type { MailConfig } from '../config.ts';
import { getPostmarkServerToken, sendPostmarkTemplateEmail, templateReference } from './postmark.ts';

export type TemplateModel = Record<string, string>;

export interface SendResult {
  delivered: boolean;
  message_id?: string;
  error?: string;
}

export interface TemplateMailer {
  /** True when a sender, a recipient and a token source are configured. */
  isConfigured(): boolean;
  send(template: string, model: TemplateModel): Promise<SendResult>;
}

/**
 * A mailer that sends every notification to `mail.to_email`.
 *
 * Send failures are logged and reported in the result rather than thrown, so
 * one bad message does not abort a batch.
 */
export function createPostmarkMailer(mail: MailConfig): TemplateMailer {
  return {
    isConfigured() {
      return Boolean(mail.from_email && mail.to_email && (mail.server_token || mail.server_token_file));
    },

    async send(template, model) {
      if (!mail.from_email || !mail.to_email) {
        console.warn('[Postmark] POSTMARK_FROM_EMAIL or NOTIFY_TO_EMAIL not set - email will not be sent');
        return { delivered: false, error: 'not_configured' };
      }

      const token = await getPostmarkServerToken(mail);
      if (!token) {
        console.warn('[Postmark] No server token configured - email will not be sent');
        return { delivered: false, error: 'no_token' };
      }

      try {
        const result = await sendPostmarkTemplateEmail(token, {
          From: mail.from_email,
          To: mail.to_email,
          ...templateReference(template),
          TemplateModel: model,
          MessageStream: mail.message_stream,
        });
        console.log(`[Postmark] Template "${template}" sent (${result.MessageID})`);
        return { delivered: true, message_id: result.MessageID };
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        console.error(`[Postmark] Failed to send template "${template}": ${message}`);
        return { delivered: false, error: message };
      }
    },
  };
}
