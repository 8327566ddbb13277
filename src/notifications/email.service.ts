import { Inject, Injectable, Logger } from '@nestjs/common';
import { Resend } from 'resend';
import { EmailOptions } from '../config/app.config';
import { EMAIL_OPTIONS } from './notifications.constants';

export interface EmailResult {
  success: boolean;
  /** True when nothing was attempted because credentials are missing */
  skipped?: boolean;
  messageId?: string;
  error?: string;
}

export interface PriceDropAlert {
  productName: string;
  oldPrice: number;
  newPrice: number;
  url: string;
}

export interface EmailContent {
  subject: string;
  text: string;
}

const formatAmount = (amount: number): string => amount.toFixed(2);

export function buildPriceDropEmail(alert: PriceDropAlert): EmailContent {
  return {
    subject: `Price Drop Alert: ${alert.productName}`,
    text:
      `The price for ${alert.productName} has dropped from $${formatAmount(alert.oldPrice)} ` +
      `to $${formatAmount(alert.newPrice)}.\n\nProduct link: ${alert.url}`,
  };
}

@Injectable()
export class EmailService {
  private readonly logger = new Logger(EmailService.name);
  private client: Resend | null = null;

  constructor(@Inject(EMAIL_OPTIONS) private readonly options: EmailOptions) {}

  isConfigured(): boolean {
    return Boolean(this.options.apiKey && this.options.from && this.options.to);
  }

  private getClient(apiKey: string): Resend {
    if (!this.client) {
      this.client = new Resend(apiKey);
    }
    return this.client;
  }

  async sendPriceDropAlert(alert: PriceDropAlert): Promise<EmailResult> {
    const { apiKey, from, to } = this.options;
    if (!apiKey || !from || !to) {
      this.logger.warn('Email credentials not fully set (RESEND_API_KEY, EMAIL_FROM, EMAIL_TO); alert not sent');
      return { success: false, skipped: true, error: 'Email not configured' };
    }

    const content = buildPriceDropEmail(alert);
    try {
      const { data, error } = await this.getClient(apiKey).emails.send({
        from,
        to,
        subject: content.subject,
        text: content.text,
      });

      if (error) {
        this.logger.error(`Failed to send price drop alert for ${alert.productName}: ${error.message}`);
        return { success: false, error: error.message };
      }

      this.logger.log(`Price drop alert sent for ${alert.productName}`);
      return { success: true, messageId: data?.id };
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      this.logger.error(`Failed to send price drop alert for ${alert.productName}: ${message}`);
      return { success: false, error: message };
    }
  }
}
