/**
 * @file src/services/mailjet.ts
 * @description Mailjet Send API v3.1 client
 * @context Transport behind the delivery role; one message per call
 */

import { z } from 'zod';
import config from '../config';
import { DeliveryProviderError } from '../types/errors';
import { logger } from '../utils/logger';

export interface EmailMessage {
  to: string;
  subject: string;
  html: string;
}

const sendResponseSchema = z.object({
  Messages: z.array(
    z.object({
      Status: z.string(),
      To: z
        .array(z.object({ Email: z.string(), MessageID: z.union([z.number(), z.string()]).optional() }))
        .optional(),
      Errors: z.array(z.object({ ErrorMessage: z.string() })).optional(),
    })
  ),
});

export class MailjetService {
  private apiUrl: string;
  private apiKey: string;
  private apiSecret: string;
  private from: string;

  constructor(options: { apiUrl?: string; apiKey?: string; apiSecret?: string; from?: string } = {}) {
    this.apiUrl = options.apiUrl ?? config.mailjet.apiUrl;
    this.apiKey = options.apiKey ?? config.mailjet.apiKey;
    this.apiSecret = options.apiSecret ?? config.mailjet.apiSecret;
    this.from = options.from ?? config.mailjet.from;
  }

  /**
   * Sends one HTML email
   * @returns Mailjet message id when the API reports one
   */
  async send(
    message: EmailMessage,
    options: { requestId?: string; signal?: AbortSignal } = {}
  ): Promise<{ messageId?: string }> {
    if (!this.apiKey || !this.apiSecret || !this.from) {
      throw new DeliveryProviderError('mailjet', 0, 'Mailjet credentials or sender address are not configured');
    }

    const startTime = Date.now();
    const auth = Buffer.from(`${this.apiKey}:${this.apiSecret}`).toString('base64');

    const body = {
      Messages: [
        {
          From: { Email: this.from },
          To: [{ Email: message.to }],
          Subject: message.subject,
          HTMLPart: message.html,
        },
      ],
    };

    const response = await fetch(`${this.apiUrl}/send`, {
      method: 'POST',
      headers: {
        'Authorization': `Basic ${auth}`,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify(body),
      signal: options.signal,
    });

    if (!response.ok) {
      const errorText = await response.text();
      logger.error('Mailjet API error', {
        request_id: options.requestId,
        status: response.status,
        error: errorText,
        duration_ms: Date.now() - startTime,
      });
      throw new DeliveryProviderError('mailjet', response.status, errorText);
    }

    const parsed = sendResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new DeliveryProviderError('mailjet', response.status, 'unexpected response payload');
    }

    const [result] = parsed.data.Messages;
    if (!result || result.Status !== 'success') {
      const reason = result?.Errors?.map(e => e.ErrorMessage).join('; ') || 'message was not accepted';
      throw new DeliveryProviderError('mailjet', response.status, reason);
    }

    const messageId = result.To?.[0]?.MessageID;

    logger.info('Email sent', {
      request_id: options.requestId,
      duration_ms: Date.now() - startTime,
      message_id: messageId,
    });

    return { messageId: messageId === undefined ? undefined : String(messageId) };
  }
}

export default MailjetService;
