import { HOTEL, HotelProfile } from '../config/hotel';
import { QuestionAnswerer } from '../types/agent';
import { ROOM_TYPES } from '../types/reservation';
import { toError } from '../utils/errors';
import { logger } from '../utils/logger';
import { ANSWER_FALLBACK, buildAnswerSystemPrompt } from '../utils/prompts';
import { AnthropicService, CompletionClient } from './anthropic.service';

export class AnswerService implements QuestionAnswerer {
  constructor(
    private llm: CompletionClient = new AnthropicService(),
    private hotel: HotelProfile = HOTEL
  ) {}

  async answer(text: string): Promise<string> {
    try {
      const content = await this.llm.complete({
        system: buildAnswerSystemPrompt(this.hotel),
        messages: [{ role: 'user', content: text }],
        maxTokens: 300,
        temperature: 0.3,
      });

      if (content) return content;
      logger.warn('Empty answer from model, using fallback');
    } catch (error: unknown) {
      logger.error('Question answering failed, using fallback', { error: toError(error).message });
    }

    return this.generateFallbackAnswer(text);
  }

  /** Answers the common questions straight from the hotel profile. */
  generateFallbackAnswer(text: string): string {
    const lower = text.toLowerCase();
    const { hotel } = this;

    const asksCheckIn = /check[\s-]?in/.test(lower);
    const asksCheckOut = /check[\s-]?out/.test(lower);

    if (asksCheckIn && asksCheckOut) {
      return `Check-in is from ${hotel.check_in_time} and check-out is by ${hotel.check_out_time}.`;
    }
    if (asksCheckOut) {
      return `Check-out is by ${hotel.check_out_time}.`;
    }
    if (asksCheckIn) {
      return `Check-in is from ${hotel.check_in_time}.`;
    }

    if (/amenit|pool|spa|wi-?fi|restaurant/.test(lower)) {
      return `${hotel.name} offers: ${hotel.amenities.join(', ')}.`;
    }

    if (/room|price|rate|cost/.test(lower)) {
      const rooms = ROOM_TYPES.map((type) => {
        const info = hotel.room_types[type];
        return `${type} (${hotel.currency} ${info.price}/night, up to ${info.capacity} guests)`;
      });
      return `Our rooms: ${rooms.join(', ')}.`;
    }

    return ANSWER_FALLBACK;
  }
}
