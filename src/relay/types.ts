export interface InboundMessage {
  readonly id: string;
  readonly channel: string;
  readonly conversationId: string;
  readonly senderId: string;
  readonly text: string;
  readonly timestamp: Date;
  /** Username of the receiving bot, on platforms where commands can name one. */
  readonly botUsername?: string;
}

/** Outbound side of a channel. */
export interface ReplyTransport {
  send(conversationId: string, text: string): Promise<void>;
  /** Best-effort; callers ignore its failure. */
  sendTyping(conversationId: string): Promise<void>;
}

export interface PipelineResult {
  outcome: 'replied' | 'provider_error' | 'unexpected_error';
  /** Texts handed to the transport, in order. */
  chunks: string[];
}
