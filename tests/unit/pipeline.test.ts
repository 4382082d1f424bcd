import { describe, it, expect, vi, afterEach } from 'vitest';
import { MessagePipeline, PROVIDER_APOLOGY, UNEXPECTED_APOLOGY } from '../../src/relay/pipeline.js';
import { ProviderError } from '../../src/errors.js';
import { MockProvider } from '../helpers/mock-llm.js';
import { RecordingTransport } from '../helpers/fake-transport.js';
import { inbound } from '../helpers/test-fixtures.js';
import { preview } from '../../src/relay/chunker.js';

function makePipeline(provider: MockProvider, maxChunkLength = 4096): MessagePipeline {
  return new MessagePipeline({ provider, model: 'test-model', maxChunkLength, previewLength: 50 });
}

describe('MessagePipeline', () => {
  it('should send a single empty chunk when the reply is only whitespace', async () => {
    const provider = new MockProvider('  \n\t ');
    const transport = new RecordingTransport();

    const result = await makePipeline(provider).handle(inbound('hi'), transport);

    expect(result).toEqual({ outcome: 'replied', chunks: [''] });
    expect(transport.texts()).toEqual(['']);
  });

  it('should send a short reply as one trimmed chunk', async () => {
    const provider = new MockProvider('  hello\n');
    const transport = new RecordingTransport();

    const result = await makePipeline(provider).handle(inbound('hi'), transport);

    expect(result.chunks).toEqual(['hello']);
    expect(transport.sent).toEqual([{ chatId: '42', text: 'hello' }]);
  });

  it('should send a reply of exactly 4096 characters as one chunk', async () => {
    const provider = new MockProvider('q'.repeat(4096));
    const transport = new RecordingTransport();

    await makePipeline(provider).handle(inbound('hi'), transport);

    expect(transport.sent).toHaveLength(1);
    expect(transport.sent[0].text).toHaveLength(4096);
  });

  it('should split a 5000 character reply into two ordered chunks', async () => {
    const text = 'a'.repeat(4096) + 'b'.repeat(904);
    const provider = new MockProvider(text);
    const transport = new RecordingTransport();

    const result = await makePipeline(provider).handle(inbound('hi'), transport);

    expect(result.outcome).toBe('replied');
    expect(transport.texts()).toEqual(['a'.repeat(4096), 'b'.repeat(904)]);
    expect(transport.texts().join('')).toBe(text);
  });

  it('should deliver chunks sequentially, each after the previous send completes', async () => {
    const provider = new MockProvider('abcdef');
    const events: string[] = [];
    const transport = {
      async send(_chatId: string, text: string) {
        events.push(`start ${text}`);
        await new Promise(resolve => setTimeout(resolve, 5));
        events.push(`end ${text}`);
      },
      async sendTyping() {},
    };

    await makePipeline(provider, 2).handle(inbound('hi'), transport);

    expect(events).toEqual(['start ab', 'end ab', 'start cd', 'end cd', 'start ef', 'end ef']);
  });

  it('should call the provider exactly once with the model and message text', async () => {
    const provider = new MockProvider('ok');

    await makePipeline(provider).handle(inbound('what is 2+2?'), new RecordingTransport());

    expect(provider.calls).toEqual([{ model: 'test-model', text: 'what is 2+2?' }]);
  });

  it('should send the provider apology once on a provider error', async () => {
    const provider = new MockProvider(new ProviderError('mock', 'quota exceeded', { status: 429 }));
    const transport = new RecordingTransport();

    const result = await makePipeline(provider).handle(inbound('hi'), transport);

    expect(result).toEqual({ outcome: 'provider_error', chunks: [PROVIDER_APOLOGY] });
    expect(transport.texts()).toEqual([PROVIDER_APOLOGY]);
    expect(provider.calls).toHaveLength(1);
  });

  it('should send the unexpected-error apology once on any other error', async () => {
    const provider = new MockProvider(new TypeError('boom'));
    const transport = new RecordingTransport();

    const result = await makePipeline(provider).handle(inbound('hi'), transport);

    expect(result).toEqual({ outcome: 'unexpected_error', chunks: [UNEXPECTED_APOLOGY] });
    expect(transport.texts()).toEqual([UNEXPECTED_APOLOGY]);
    expect(provider.calls).toHaveLength(1);
  });

  it('should treat a non-Error rejection as unexpected', async () => {
    const provider = new MockProvider(() => Promise.reject('string failure'));
    const transport = new RecordingTransport();

    const result = await makePipeline(provider).handle(inbound('hi'), transport);

    expect(result.outcome).toBe('unexpected_error');
    expect(transport.texts()).toEqual([UNEXPECTED_APOLOGY]);
  });

  it('should signal typing before generating', async () => {
    const transport = new RecordingTransport();
    const provider = new MockProvider(async () => {
      expect(transport.typing).toEqual(['42']);
      return 'ok';
    });

    await makePipeline(provider).handle(inbound('hi'), transport);

    expect(transport.texts()).toEqual(['ok']);
  });

  it('should carry on when the typing indicator fails', async () => {
    const provider = new MockProvider('still here');
    const transport = new RecordingTransport();
    transport.failTyping = true;

    const result = await makePipeline(provider).handle(inbound('hi'), transport);

    expect(result.outcome).toBe('replied');
    expect(transport.texts()).toEqual(['still here']);
  });

  it('should stop delivering and apologise when a send fails midway', async () => {
    const provider = new MockProvider('aabbcc');
    const transport = new RecordingTransport();
    transport.failSendAt.add(1);

    const result = await makePipeline(provider, 2).handle(inbound('hi'), transport);

    expect(result).toEqual({ outcome: 'unexpected_error', chunks: ['aa', UNEXPECTED_APOLOGY] });
    expect(transport.texts()).toEqual(['aa', UNEXPECTED_APOLOGY]);
    expect(provider.calls).toHaveLength(1);
  });

  it('should not throw when the apology itself cannot be sent', async () => {
    const provider = new MockProvider(new ProviderError('mock', 'bad request', { status: 400 }));
    const transport = new RecordingTransport();
    transport.failSendAt.add(0);

    const result = await makePipeline(provider).handle(inbound('hi'), transport);

    expect(result.outcome).toBe('provider_error');
    expect(transport.sent).toEqual([]);
  });
});

describe('MessagePipeline failure logging', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should log the chat id and a preview of the input', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const text = 'tell me a very long story about '.repeat(3);
    const provider = new MockProvider(new ProviderError('mock', 'quota exceeded', { status: 429 }));

    await makePipeline(provider).handle(inbound(text), new RecordingTransport());

    expect(errorSpy).toHaveBeenCalledTimes(1);
    const line = String(errorSpy.mock.calls[0][0]);
    expect(line).toContain(`mock API error for chat 42 (message '${preview(text, 50)}'): quota exceeded`);
    expect(preview(text, 50)).toHaveLength(53);
  });
});

describe('MessagePipeline.replyFor', () => {
  const pipeline = makePipeline(new MockProvider('unused'), 3);

  it('should chunk successful text', () => {
    expect(pipeline.replyFor({ kind: 'ok', text: ' abcdefg ' })).toEqual(['abc', 'def', 'g']);
  });

  it('should pick the apology by failure kind', () => {
    expect(pipeline.replyFor({ kind: 'provider_error', error: new Error('x') })).toEqual([PROVIDER_APOLOGY]);
    expect(pipeline.replyFor({ kind: 'unexpected_error', error: new Error('x') })).toEqual([UNEXPECTED_APOLOGY]);
  });
});
