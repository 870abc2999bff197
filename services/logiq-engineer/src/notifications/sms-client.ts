import twilio from 'twilio';

export interface SmsSender {
  send(to: string, body: string): Promise<void>;
}

export interface TwilioOptions {
  accountSid: string;
  authToken: string;
  fromNumber: string;
}

export class TwilioSmsClient implements SmsSender {
  private readonly client: ReturnType<typeof twilio>;
  private readonly fromNumber: string;

  constructor(options: TwilioOptions) {
    this.client = twilio(options.accountSid, options.authToken);
    this.fromNumber = options.fromNumber;
  }

  async send(to: string, body: string): Promise<void> {
    await this.client.messages.create({ to, from: this.fromNumber, body });
  }
}
