import { describe, it, expect } from 'vitest';
import { cliMessage, createCliTransport } from '../../src/channels/cli-channel.js';

describe('createCliTransport', () => {
  it('should write each chunk as its own block', async () => {
    const out: string[] = [];
    const transport = createCliTransport(s => out.push(s));

    await transport.send('cli', 'first');
    await transport.send('cli', 'second');

    expect(out).toEqual(['\nfirst\n\n', '\nsecond\n\n']);
  });
});

describe('cliMessage', () => {
  it('should build an inbound message for the local conversation', () => {
    const msg = cliMessage('hello');
    expect(msg.channel).toBe('cli');
    expect(msg.conversationId).toBe('cli');
    expect(msg.senderId).toBe('local');
    expect(msg.text).toBe('hello');
  });
});
