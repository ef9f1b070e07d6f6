import { logger } from '../../utils/logger';
import { DeliverySink } from './delivery.adapter';

/** Writes outbound messages to the log; used for web chat and local runs. */
export class LoggerSink implements DeliverySink {
  readonly provider = 'logger';

  async send(sessionId: string, text: string): Promise<void> {
    logger.info('Outbound message', { sessionId, text });
  }
}
