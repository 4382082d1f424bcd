import type { ReplyTransport } from '../../src/relay/types.js';

export interface SentMessage {
  chatId: string;
  text: string;
}

/** Records sends in order; individual sends can be made to fail. */
export class RecordingTransport implements ReplyTransport {
  sent: SentMessage[] = [];
  typing: string[] = [];
  failTyping = false;
  /** Zero-based indexes of send calls that reject. */
  failSendAt = new Set<number>();
  private sendCalls = 0;

  async send(chatId: string, text: string): Promise<void> {
    const index = this.sendCalls++;
    if (this.failSendAt.has(index)) {
      throw new Error(`send ${index} failed`);
    }
    this.sent.push({ chatId, text });
  }

  async sendTyping(chatId: string): Promise<void> {
    this.typing.push(chatId);
    if (this.failTyping) throw new Error('typing failed');
  }

  texts(): string[] {
    return this.sent.map(m => m.text);
  }
}
