import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { getAgentService } from '../config/services';
import { validateTwilioWebhook } from '../middleware/twilio.validator';
import { toError } from '../utils/errors';
import { logger } from '../utils/logger';

const router = Router();

const twilioInboundSchema = z.object({
  From: z.string().min(1),
  Body: z.string().min(1),
});

// Twilio sends form-encoded POST; the reply goes out through the REST API.
router.post('/sms', validateTwilioWebhook, async (req: Request, res: Response) => {
  const parsed = twilioInboundSchema.safeParse(req.body);
  if (!parsed.success) {
    return res.status(400).json({ error: 'Missing From or Body' });
  }

  const { From: from, Body: body } = parsed.data;

  try {
    logger.info('SMS received', { from });

    await getAgentService().handleMessage({
      session_id: from,
      message: body,
      channel: 'sms',
    });
  } catch (error: unknown) {
    logger.error('Twilio webhook error', { from, error: toError(error).message });
  }

  // Always 200 so Twilio does not retry the delivery.
  res.type('text/xml').send('<Response></Response>');
});

export default router;
