import type { MetricsSource } from '../metrics/system-metrics.js';
import { formatStatusReport } from '../metrics/system-metrics.js';
import * as log from '../utils/logger.js';

export const COMMAND_PREFIX = '/';
export const METRICS_FAILURE = '⚠️ Failed to read system metrics.';

export interface CommandContext {
  senderId: string;
  conversationId: string;
  /** Commands addressed `@` another bot are ignored when this is set. */
  botUsername?: string;
}

export interface CommandDefinition {
  name: string;
  description: string;
  run(ctx: CommandContext): Promise<string>;
}

export interface DispatcherDeps {
  model: string;
  metrics: MetricsSource;
}

export function isCommand(text: string): boolean {
  return text.startsWith(COMMAND_PREFIX);
}

/**
 * Parse `/name`, `/name@bot` or `/name args` into the lower-cased name.
 * Returns undefined when the text is not a command, or when it mentions
 * a bot other than `botUsername`.
 */
export function parseCommand(text: string, botUsername?: string): string | undefined {
  if (!isCommand(text)) return undefined;
  const token = text.slice(COMMAND_PREFIX.length).split(/\s/, 1)[0] ?? '';
  const parts = token.split('@', 2);
  const name = parts[0] ?? '';
  const mention: string | undefined = parts[1];
  if (mention !== undefined && botUsername !== undefined && mention.toLowerCase() !== botUsername.toLowerCase()) {
    return undefined;
  }
  return name ? name.toLowerCase() : undefined;
}

/**
 * Command dispatcher: a table of fixed or metrics-derived replies.
 */
export class CommandDispatcher {
  private commands = new Map<string, CommandDefinition>();

  constructor(deps: DispatcherDeps) {
    this.register({
      name: 'start',
      description: 'Start the conversation',
      run: async () => [
        `👋 Hello! I'm a bot powered by ${deps.model}.`,
        "Just send me a message and I'll do my best to respond!",
        'Use /help to see available commands.',
      ].join('\n'),
    });

    this.register({
      name: 'help',
      description: 'Show this help message',
      run: async () => [
        '📝 Available commands:',
        ...this.list().map(c => `${COMMAND_PREFIX}${c.name} - ${c.description}`),
        '',
        'To chat, just send a text message directly.',
      ].join('\n'),
    });

    this.register({
      name: 'status',
      description: 'Show CPU, RAM and disk usage',
      run: async () => {
        try {
          return formatStatusReport(await deps.metrics.read());
        } catch (err) {
          log.error(`Status: failed to read system metrics: ${log.errorMessage(err)}`);
          return METRICS_FAILURE;
        }
      },
    });
  }

  register(command: CommandDefinition): void {
    this.commands.set(command.name, command);
  }

  list(): CommandDefinition[] {
    return [...this.commands.values()];
  }

  /** Reply text for a command, or undefined if it is not one we know. */
  async dispatch(text: string, ctx: CommandContext): Promise<string | undefined> {
    const name = parseCommand(text, ctx.botUsername);
    const command = name ? this.commands.get(name) : undefined;
    if (!command) {
      log.debug(`Ignoring unknown command '${text.split(/\s/, 1)[0]}' from ${ctx.senderId}`);
      return undefined;
    }

    log.info(`User ${ctx.senderId} used /${command.name} command`);
    return command.run(ctx);
  }
}
