#!/usr/bin/env node
/**
 * chat-relay: Telegram to generative-language API relay.
 *
 * Entry point: commander-based CLI with subcommands.
 */

import { createRequire } from 'node:module';
import { Command } from 'commander';
import { runGateway } from './commands/gateway.js';
import { runChat } from './commands/chat.js';
import { runStatus } from './commands/status.js';
import { ConfigurationError } from './errors.js';
import * as log from './utils/logger.js';

const require = createRequire(import.meta.url);
const { version } = require('../package.json');

const program = new Command();

program
  .name('chat-relay')
  .description('Relay Telegram messages to a generative-language API')
  .version(version);

// Default action: gateway, or single-message mode with -m
program
  .option('-m, --message <text>', 'Send a single message through the relay and exit')
  .option('-d, --debug', 'Enable debug logging')
  .action(async (opts: { message?: string; debug?: boolean }) => {
    if (opts.message !== undefined) {
      await runChat(opts);
      return;
    }
    await runGateway(opts);
  });

program
  .command('gateway')
  .description('Serve Telegram (long polling) until interrupted')
  .action(async (_opts: unknown, cmd: Command) => {
    await runGateway(cmd.optsWithGlobals<{ debug?: boolean }>());
  });

program
  .command('chat')
  .description('Interactive local chat through the same pipeline')
  .action(async (_opts: unknown, cmd: Command) => {
    await runChat(cmd.optsWithGlobals<{ debug?: boolean }>());
  });

program
  .command('status')
  .description('Print host CPU, RAM and disk usage')
  .action(async () => {
    await runStatus();
  });

program.parseAsync().catch((err: unknown) => {
  if (err instanceof ConfigurationError) {
    log.error(err.message);
  } else {
    log.error(`Fatal: ${log.errorMessage(err)}`);
  }
  process.exit(1);
});
