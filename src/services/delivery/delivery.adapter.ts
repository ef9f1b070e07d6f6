export interface DeliverySink {
  readonly provider: string;
  send(sessionId: string, text: string): Promise<void>;
}

export interface TwilioCredentials {
  accountSid: string;
  authToken: string;
  fromNumber: string;
}
