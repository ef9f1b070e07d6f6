import { ClassificationResult, IntentClassifier } from '../types/agent';
import { HistoryEntry, Intent, isIntent } from '../types/conversation';
import { toError } from '../utils/errors';
import { logger } from '../utils/logger';
import { buildClassificationRequest, buildClassifierPrompt } from '../utils/prompts';
import { AnthropicService, CompletionClient } from './anthropic.service';

const EDGE_NOISE = /^[\s"'`.,:;!?*]+|[\s"'`.,:;!?*]+$/g;

/** Maps a raw model reply onto an intent; anything but a bare label is `unknown`. */
export function parseIntentLabel(raw: string): Intent {
  const label = raw.toLowerCase().replace(EDGE_NOISE, '');
  return isIntent(label) ? label : 'unknown';
}

export class ClassifierService implements IntentClassifier {
  constructor(private llm: CompletionClient = new AnthropicService()) {}

  async classify(text: string, history: HistoryEntry[]): Promise<ClassificationResult> {
    try {
      const raw = await this.llm.complete({
        system: buildClassifierPrompt(),
        messages: [{ role: 'user', content: buildClassificationRequest(text, history) }],
        maxTokens: 10,
        temperature: 0,
      });

      const intent = parseIntentLabel(raw);
      if (intent === 'unknown') {
        logger.debug('Classifier returned no usable label', { raw: raw.slice(0, 100) });
      }
      return { intent, degraded: false };
    } catch (error: unknown) {
      logger.warn('Intent classification unavailable', { error: toError(error).message });
      return { intent: 'unknown', degraded: true };
    }
  }
}
