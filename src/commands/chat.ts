import { loadConfig, requireApiKey } from '../config/config.js';
import { createApp } from '../bootstrap.js';
import { CLIChannel, cliMessage, createCliTransport } from '../channels/cli-channel.js';
import * as log from '../utils/logger.js';

/**
 * Local chat: the same routing as Telegram, over stdin/stdout.
 * With `message`, route that one message and return.
 */
export async function runChat(opts: { message?: string; debug?: boolean } = {}): Promise<void> {
  const config = await loadConfig();
  log.setLogLevel(opts.debug ? 'debug' : config.logLevel);

  const app = createApp(config, requireApiKey(config));

  if (opts.message !== undefined) {
    await app.router.route(cliMessage(opts.message), createCliTransport());
    return;
  }

  const ac = new AbortController();
  process.on('SIGINT', () => ac.abort());
  process.on('SIGTERM', () => ac.abort());

  await new CLIChannel().start(app.router, ac.signal);
}
