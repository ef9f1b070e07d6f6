import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { getAgentService } from '../config/services';
import { ValidationError } from '../utils/errors';

const router = Router();

const chatMessageSchema = z.object({
  session_id: z.string().min(1).max(128),
  message: z.string().min(1).max(5000),
});

router.post('/message', async (req: Request, res: Response, next: NextFunction) => {
  try {
    const parsed = chatMessageSchema.safeParse(req.body);
    if (!parsed.success) {
      throw new ValidationError(parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join(', '));
    }

    const result = await getAgentService().handleMessage({
      ...parsed.data,
      channel: 'web',
    });

    res.json(result);
  } catch (error: unknown) {
    next(error);
  }
});

router.delete('/session/:sessionId', async (req: Request, res: Response, next: NextFunction) => {
  try {
    await getAgentService().resetSession(String(req.params.sessionId));
    res.json({ success: true });
  } catch (error: unknown) {
    next(error);
  }
});

export default router;
