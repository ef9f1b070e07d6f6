import { promises as fs } from 'fs';
import path from 'path';
import { Reservation, ReservationStore, ReservationUpdate, UpdateOptions } from '../types/reservation';
import { DuplicateReservationError, StoreReadError, StoreWriteError, toError, ValidationError } from '../utils/errors';
import { logger } from '../utils/logger';
import { Mutex } from '../utils/mutex';
import { ReservationDocument, reservationDocumentSchema, reservationSchema } from '../utils/schemas';

/**
 * Reservation records kept in one JSON document on disk.
 *
 * Every mutation reads the whole document, applies the change and writes the
 * whole document back through a temp file and a rename, so the target file is
 * always either the old or the new document. Mutations are serialized by a
 * single lock; reads are not.
 */
export class JsonFileReservationStore implements ReservationStore {
  private writeLock = new Mutex();

  constructor(private filePath: string) {}

  async get(id: string): Promise<Reservation | null> {
    const document = await this.readDocument();
    return Object.hasOwn(document.reservations, id) ? document.reservations[id] : null;
  }

  async list(): Promise<Reservation[]> {
    const document = await this.readDocument();
    return Object.values(document.reservations);
  }

  async put(reservation: Reservation): Promise<string> {
    const record = this.checkRecord(reservation);

    return this.writeLock.runExclusive(async () => {
      const document = await this.readDocument();
      if (Object.hasOwn(document.reservations, record.id)) {
        throw new DuplicateReservationError(record.id);
      }

      document.reservations[record.id] = record;
      await this.writeDocument(document);

      logger.info('Reservation created', { reservationId: record.id, roomType: record.room_type });
      return record.id;
    });
  }

  async update(id: string, fields: ReservationUpdate, options: UpdateOptions = {}): Promise<boolean> {
    return this.writeLock.runExclusive(async () => {
      const document = await this.readDocument();
      if (!Object.hasOwn(document.reservations, id)) {
        return false;
      }

      const existing = document.reservations[id];
      if (options.expectStatus && existing.status !== options.expectStatus) {
        logger.warn('Reservation update refused', { reservationId: id, status: existing.status });
        return false;
      }

      document.reservations[id] = this.checkRecord({
        ...existing,
        ...fields,
        id: existing.id,
        updated_at: new Date().toISOString(),
      });
      await this.writeDocument(document);

      logger.info('Reservation updated', { reservationId: id, fields: Object.keys(fields) });
      return true;
    });
  }

  private checkRecord(reservation: Reservation): Reservation {
    const parsed = reservationSchema.safeParse(reservation);
    if (!parsed.success) {
      throw new ValidationError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join(', '));
    }
    if (parsed.data.check_out <= parsed.data.check_in) {
      throw new ValidationError('check_out must be after check_in');
    }
    return parsed.data;
  }

  private async readDocument(): Promise<ReservationDocument> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf8');
    } catch (error: unknown) {
      if (isMissingFile(error)) {
        return { reservations: {} };
      }
      throw new StoreReadError(this.filePath, toError(error));
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (error: unknown) {
      throw new StoreReadError(this.filePath, toError(error));
    }

    const parsed = reservationDocumentSchema.safeParse(data);
    if (!parsed.success) {
      throw new StoreReadError(this.filePath, new Error(parsed.error.message));
    }
    return parsed.data;
  }

  private async writeDocument(document: ReservationDocument): Promise<void> {
    const tempPath = `${this.filePath}.${process.pid}.${Date.now()}.tmp`;
    const body = `${JSON.stringify(document, null, 2)}\n`;

    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });

      const handle = await fs.open(tempPath, 'w');
      try {
        await handle.writeFile(body, 'utf8');
        await handle.sync();
      } finally {
        await handle.close();
      }

      await fs.rename(tempPath, this.filePath);
    } catch (error: unknown) {
      const cause = toError(error);
      logger.error('Reservation store write failed', { file: this.filePath, error: cause.message });
      await this.removeTempFile(tempPath);
      throw new StoreWriteError(`Reservation store write failed: ${cause.message}`, cause);
    }
  }

  private async removeTempFile(tempPath: string): Promise<void> {
    try {
      await fs.rm(tempPath, { force: true });
    } catch (error: unknown) {
      logger.warn('Could not remove temp file', { file: tempPath, error: toError(error).message });
    }
  }
}

function isMissingFile(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
