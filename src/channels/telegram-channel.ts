import { randomUUID } from 'node:crypto';
import { Bot } from 'grammy';
import { run, sequentialize, type RunnerHandle } from '@grammyjs/runner';
import type { RelayConfig } from '../config/schema.js';
import type { CommandDispatcher } from '../relay/commands.js';
import type { MessageRouter } from '../relay/router.js';
import type { InboundMessage, ReplyTransport } from '../relay/types.js';
import * as log from '../utils/logger.js';

const START_MAX_RETRIES = 3;
const START_RETRY_DELAY_MS = 5000;

/** The slice of grammy's Api the transport uses. */
export interface TelegramApi {
  sendMessage(chatId: string, text: string): Promise<unknown>;
  sendChatAction(chatId: string, action: 'typing'): Promise<unknown>;
}

export function createTelegramTransport(api: TelegramApi): ReplyTransport {
  return {
    async send(chatId, text) {
      await api.sendMessage(chatId, text);
    },
    async sendTyping(chatId) {
      await api.sendChatAction(chatId, 'typing');
    },
  };
}

/** Updates sharing a key are handled in order; different chats run concurrently. */
export function conversationKey(ctx: { chat?: { id: number } }): string | undefined {
  return ctx.chat ? String(ctx.chat.id) : undefined;
}

/** Allowlist entries match chat ids or usernames; an empty list allows everyone. */
export function isAllowed(allowlist: readonly string[], chatId: string, username?: string): boolean {
  if (allowlist.length === 0) return true;
  return allowlist.includes(chatId) || (username !== undefined && allowlist.includes(username));
}

/**
 * Telegram Channel: receives text via long polling and hands it to the router.
 */
export class TelegramChannel {
  name = 'telegram';

  async start(
    deps: { router: MessageRouter; commands: CommandDispatcher; config: Readonly<RelayConfig> },
    token: string,
    signal: AbortSignal,
  ): Promise<void> {
    const bot = new Bot(token);
    const { allowlist } = deps.config.telegram;
    const transport = createTelegramTransport(bot.api);

    // Errors outside the handler boundary, such as in middleware
    bot.catch((err) => {
      log.error(`Telegram bot error: ${err.message}`);
    });

    bot.use(sequentialize(conversationKey));

    const handlers = bot.errorBoundary((err) => {
      log.error(`Telegram handler error: ${err.message}`);
    });

    handlers.on('message:text', async (ctx) => {
      const chatId = String(ctx.chat.id);
      const username = ctx.from.username;

      if (!isAllowed(allowlist, chatId, username)) {
        log.debug(`Telegram: ignoring message from ${username ?? ctx.from.id} (chat ${chatId}, not in allowlist)`);
        return;
      }

      const inbound: InboundMessage = {
        id: randomUUID(),
        channel: 'telegram',
        conversationId: chatId,
        senderId: String(ctx.from.id),
        text: ctx.message.text,
        timestamp: new Date(ctx.message.date * 1000),
        botUsername: ctx.me.username,
      };

      await deps.router.route(inbound, transport);
    });

    try {
      await bot.api.setMyCommands(deps.commands.list().map(c => ({ command: c.name, description: c.description })));
    } catch (err) {
      log.warn(`Telegram: could not register command menu: ${log.errorMessage(err)}`);
    }

    const runner = await this.startWithRetry(bot, signal);

    await new Promise<void>((resolve) => {
      if (signal.aborted) return resolve();
      signal.addEventListener('abort', () => resolve(), { once: true });
    });

    try {
      if (runner?.isRunning()) await runner.stop();
    } catch (err) {
      log.warn(`Telegram: error while stopping the runner: ${log.errorMessage(err)}`);
    }
  }

  /**
   * Retries only the initial getMe handshake, then starts concurrent polling.
   * Returns undefined when shutdown was requested first.
   */
  private async startWithRetry(bot: Bot, signal: AbortSignal): Promise<RunnerHandle | undefined> {
    for (let attempt = 1; attempt <= START_MAX_RETRIES; attempt++) {
      if (signal.aborted) return undefined;

      try {
        log.info(`Telegram: starting bot (attempt ${attempt}/${START_MAX_RETRIES})...`);
        await bot.init();
        break;
      } catch (err) {
        log.error(`Telegram: start failed (attempt ${attempt}/${START_MAX_RETRIES}): ${log.errorMessage(err)}`);

        if (attempt < START_MAX_RETRIES) {
          log.info(`Telegram: retrying in ${START_RETRY_DELAY_MS / 1000}s...`);
          await delay(START_RETRY_DELAY_MS);
        } else {
          throw new Error(`Telegram: failed to start after ${START_MAX_RETRIES} attempts`);
        }
      }
    }

    if (signal.aborted) return undefined;

    const runner = run(bot);
    log.info(`Telegram: connected as @${bot.botInfo.username}`);
    return runner;
  }
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
