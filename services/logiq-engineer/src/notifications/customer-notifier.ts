import type { EmailSender } from './email-client.js';
import type { SmsSender } from './sms-client.js';
import type { RenderedNotice } from './templates.js';

export interface NotificationTarget {
  name: string;
  email: string;
  phoneNumber: string;
}

export interface DeliveryReport {
  email: 'sent' | 'skipped' | 'failed';
  sms: 'sent' | 'skipped' | 'failed';
}

/**
 * Fans a notice out to email and SMS. Delivery problems are logged and
 * reported, never thrown: a ticket update must not fail because a message
 * could not be sent.
 */
export class CustomerNotifier {
  constructor(
    private readonly email: EmailSender | null,
    private readonly sms: SmsSender | null
  ) {}

  async notify(target: NotificationTarget, notice: RenderedNotice): Promise<DeliveryReport> {
    const [email, sms] = await Promise.all([this.sendEmail(target, notice), this.sendSms(target, notice)]);
    return { email, sms };
  }

  private async sendEmail(target: NotificationTarget, notice: RenderedNotice): Promise<DeliveryReport['email']> {
    if (!this.email || !target.email) {
      return 'skipped';
    }
    try {
      await this.email.send({ toEmail: target.email, toName: target.name, subject: notice.subject, html: notice.html });
      return 'sent';
    } catch (error) {
      console.error(`Email notification failed (${notice.subject}):`, error instanceof Error ? error.message : error);
      return 'failed';
    }
  }

  private async sendSms(target: NotificationTarget, notice: RenderedNotice): Promise<DeliveryReport['sms']> {
    if (!this.sms || !target.phoneNumber) {
      return 'skipped';
    }
    try {
      await this.sms.send(target.phoneNumber, notice.sms);
      return 'sent';
    } catch (error) {
      console.error(`SMS notification failed (${notice.subject}):`, error instanceof Error ? error.message : error);
      return 'failed';
    }
  }
}
