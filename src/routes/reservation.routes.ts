import { Router, Request, Response, NextFunction } from 'express';
import { getReservationStore } from '../config/services';
import { ReservationNotFoundError } from '../utils/errors';
import { logger } from '../utils/logger';

const router = Router();

router.get('/', async (_req: Request, res: Response, next: NextFunction) => {
  try {
    const reservations = await getReservationStore().list();
    res.json({ success: true, reservations });
  } catch (error: unknown) {
    next(error);
  }
});

router.get('/:id', async (req: Request, res: Response, next: NextFunction) => {
  try {
    const id = String(req.params.id);
    const reservation = await getReservationStore().get(id);
    if (!reservation) {
      throw new ReservationNotFoundError(id);
    }

    res.json({ success: true, reservation });
  } catch (error: unknown) {
    next(error);
  }
});

// Reservations are never deleted; cancelling flips the status.
router.post('/:id/cancel', async (req: Request, res: Response, next: NextFunction) => {
  try {
    const id = String(req.params.id);
    const store = getReservationStore();

    const updated = await store.update(id, { status: 'cancelled' });
    if (!updated) {
      throw new ReservationNotFoundError(id);
    }

    logger.info('Reservation cancelled', { reservationId: id });
    res.json({ success: true, reservation: await store.get(id) });
  } catch (error: unknown) {
    next(error);
  }
});

export default router;
