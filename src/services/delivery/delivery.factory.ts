import { Channel } from '../../types/agent';
import { DeliverySink, TwilioCredentials } from './delivery.adapter';
import { LoggerSink } from './logger.adapter';
import { TwilioSink } from './twilio.adapter';

export class DeliveryFactory {
  /**
   * SMS goes through Twilio when credentials are present; everything else,
   * and SMS without credentials, is logged.
   */
  static create(channel: Channel, twilioCredentials?: Partial<TwilioCredentials>): DeliverySink {
    switch (channel) {
      case 'sms': {
        const { accountSid, authToken, fromNumber } = twilioCredentials ?? {};
        if (accountSid && authToken && fromNumber) {
          return new TwilioSink({ accountSid, authToken, fromNumber });
        }
        return new LoggerSink();
      }
      case 'web':
        return new LoggerSink();
      default:
        throw new Error(`Unsupported channel: ${String(channel)}`);
    }
  }
}
