import axios, { AxiosInstance } from 'axios';

export interface EmailMessage {
  toEmail: string;
  toName: string;
  subject: string;
  html: string;
}

export interface EmailSender {
  send(message: EmailMessage): Promise<void>;
}

export interface BrevoOptions {
  apiKey: string;
  senderEmail: string;
  senderName: string;
  http?: AxiosInstance;
}

/**
 * Transactional email through the Brevo v3 REST API.
 */
export class BrevoEmailClient implements EmailSender {
  private readonly client: AxiosInstance;
  private readonly sender: { email: string; name: string };

  constructor(options: BrevoOptions) {
    this.sender = { email: options.senderEmail, name: options.senderName };
    this.client =
      options.http ??
      axios.create({
        baseURL: 'https://api.brevo.com/v3',
        timeout: 15000,
        headers: {
          'Content-Type': 'application/json',
          'api-key': options.apiKey,
        },
      });
  }

  async send(message: EmailMessage): Promise<void> {
    await this.client.post('/smtp/email', {
      sender: this.sender,
      to: [{ email: message.toEmail, name: message.toName }],
      subject: message.subject,
      htmlContent: message.html,
    });
  }
}
