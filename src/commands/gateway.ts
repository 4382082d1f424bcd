/**
 * Gateway command: headless mode serving Telegram until SIGINT/SIGTERM.
 */

import { loadConfig, requireSecrets } from '../config/config.js';
import { createApp } from '../bootstrap.js';
import { TelegramChannel } from '../channels/telegram-channel.js';
import * as log from '../utils/logger.js';

export async function runGateway(opts: { debug?: boolean } = {}): Promise<void> {
  const config = await loadConfig();
  log.setLogLevel(opts.debug ? 'debug' : config.logLevel);

  // Throws ConfigurationError naming what is missing; fatal before any traffic
  const secrets = requireSecrets(config);

  const app = createApp(config, secrets.apiKey);

  const ac = new AbortController();
  const { signal } = ac;

  process.on('SIGINT', () => {
    log.info('Shutting down gateway...');
    ac.abort();
  });
  process.on('SIGTERM', () => ac.abort());

  log.info(`Gateway: relaying to ${config.llm.provider} (${config.llm.model})`);

  const tg = new TelegramChannel();
  await tg.start(app, secrets.telegramToken, signal);

  log.info('Gateway stopped');
}
