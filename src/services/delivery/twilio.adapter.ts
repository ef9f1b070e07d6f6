import twilio from 'twilio';
import { DeliveryError, errorCode, toError } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { DeliverySink, TwilioCredentials } from './delivery.adapter';

// Invalid or unreachable destination numbers.
const PERMANENT_ERROR_CODES = new Set([21211, 21614]);

/** Sends replies as SMS; the session id is the guest's phone number. */
export class TwilioSink implements DeliverySink {
  readonly provider = 'twilio';
  private client: ReturnType<typeof twilio>;

  constructor(
    private credentials: TwilioCredentials,
    private maxRetries: number = 3,
    private retryDelayMs: number = 1000
  ) {
    if (!credentials.accountSid || !credentials.authToken || !credentials.fromNumber) {
      throw new DeliveryError('twilio', 'init', new Error('Missing Twilio credentials'), false);
    }

    this.client = twilio(credentials.accountSid, credentials.authToken);
  }

  async send(sessionId: string, text: string): Promise<void> {
    const from = this.credentials.fromNumber;

    for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
      try {
        const result = await this.client.messages.create({ to: sessionId, from, body: text });
        logger.info('SMS sent', { provider: 'twilio', to: sessionId, messageSid: result.sid, attempt });
        return;
      } catch (error: unknown) {
        const cause = toError(error);
        const code = errorCode(error);
        logger.warn('Twilio send failed', { to: sessionId, attempt, code, error: cause.message });

        if (typeof code === 'number' && PERMANENT_ERROR_CODES.has(code)) {
          throw new DeliveryError('twilio', 'send', cause, false);
        }
        if (attempt === this.maxRetries) {
          throw new DeliveryError('twilio', 'send', cause, true);
        }

        await new Promise((resolve) => setTimeout(resolve, this.retryDelayMs * Math.pow(2, attempt - 1)));
      }
    }
  }
}
