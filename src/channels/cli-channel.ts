import * as readline from 'node:readline';
import { randomUUID } from 'node:crypto';
import chalk from 'chalk';
import type { MessageRouter } from '../relay/router.js';
import type { InboundMessage, ReplyTransport } from '../relay/types.js';
import * as log from '../utils/logger.js';

const EXIT_COMMANDS = new Set(['exit', 'quit', ':q']);
const CHAT_ID = 'cli';

/** Writes each chunk as its own block; typing shows as a dim marker. */
export function createCliTransport(write: (text: string) => void = s => process.stdout.write(s)): ReplyTransport {
  return {
    async send(_chatId, text) {
      write(`\n${text}\n\n`);
    },
    async sendTyping() {
      write(chalk.gray('…'));
    },
  };
}

export function cliMessage(text: string): InboundMessage {
  return {
    id: randomUUID(),
    channel: 'cli',
    conversationId: CHAT_ID,
    senderId: 'local',
    text,
    timestamp: new Date(),
  };
}

/**
 * CLI Channel: interactive REPL via stdin/stdout, routed like Telegram.
 */
export class CLIChannel {
  name = 'cli';

  async start(router: MessageRouter, signal: AbortSignal): Promise<void> {
    const rl = readline.createInterface({
      input: process.stdin,
      output: process.stdout,
      prompt: chalk.green('relay> '),
    });
    const transport = createCliTransport();

    rl.on('error', (err) => {
      log.warn(`CLI readline error: ${err.message}`);
    });

    console.log(chalk.bold('\nChat relay'));
    console.log(chalk.gray('Type a message or /help, press Enter to send. Type "exit" or Ctrl+C to quit.\n'));
    rl.prompt();

    // Lines are handled one at a time so replies never interleave
    let queue = Promise.resolve();
    let closed = false;
    rl.on('close', () => {
      closed = true;
    });

    rl.on('line', (line) => {
      const content = line.trim();

      if (EXIT_COMMANDS.has(content.toLowerCase())) {
        console.log(chalk.gray('Bye!'));
        rl.close();
        return;
      }

      queue = queue
        .then(() => router.route(cliMessage(content), transport))
        .then(() => {
          if (!closed) rl.prompt();
        });
    });

    await new Promise<void>((resolveP) => {
      rl.on('close', resolveP);
      signal.addEventListener('abort', () => {
        rl.close();
        resolveP();
      }, { once: true });
    });

    await queue;
  }
}
