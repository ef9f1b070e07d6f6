import { Request, Response, NextFunction, RequestHandler } from 'express';
import twilio from 'twilio';
import { env } from '../config/env';
import { logger } from '../utils/logger';

export interface TwilioSignatureOptions {
  authToken?: string;
  /** Public origin Twilio posts to; the signature covers the full URL. */
  baseUrl: string;
  enforce: boolean;
}

export function twilioSignature(options: TwilioSignatureOptions): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!options.enforce) {
      return next();
    }

    const signature = req.header('x-twilio-signature');
    if (!signature) {
      logger.warn('Missing Twilio signature', { path: req.originalUrl });
      return res.status(403).json({ error: 'Missing signature' });
    }

    if (!options.authToken) {
      logger.warn('Twilio auth token not configured');
      return res.status(503).json({ error: 'Twilio not configured' });
    }

    const url = `${options.baseUrl}${req.originalUrl}`;
    if (!twilio.validateRequest(options.authToken, signature, url, req.body)) {
      logger.warn('Invalid Twilio signature', { url });
      return res.status(403).json({ error: 'Invalid signature' });
    }

    next();
  };
}

// Local runs post to the webhook by hand, unsigned.
export const validateTwilioWebhook = twilioSignature({
  authToken: env.TWILIO_AUTH_TOKEN,
  baseUrl: env.WEBHOOK_BASE_URL,
  enforce: env.NODE_ENV !== 'development',
});
