import { HistoryEntry, Intent } from './conversation';

export type Channel = 'web' | 'sms';

export interface IncomingMessage {
  session_id: string;
  message: string;
  channel: Channel;
}

export interface AgentResponse {
  success: boolean;
  session_id: string;
  response: string;
  stage: string;
  reservation_id: string | null;
  delivered: boolean;
}

export interface ClassificationResult {
  intent: Intent;
  /** Set when the language service could not be reached and `intent` is a fallback. */
  degraded: boolean;
}

export interface IntentClassifier {
  classify(text: string, history: HistoryEntry[]): Promise<ClassificationResult>;
}

export interface QuestionAnswerer {
  answer(text: string): Promise<string>;
}
