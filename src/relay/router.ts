import type { CommandDispatcher } from './commands.js';
import type { MessagePipeline } from './pipeline.js';
import type { InboundMessage, ReplyTransport } from './types.js';
import { isCommand } from './commands.js';
import * as log from '../utils/logger.js';

interface Route {
  name: string;
  matches(msg: InboundMessage): boolean;
  handle(msg: InboundMessage, transport: ReplyTransport): Promise<void>;
}

/**
 * Routes each inbound message to the first matching handler:
 * commands to the dispatcher, any other non-blank text to the pipeline.
 * Never rejects.
 */
export class MessageRouter {
  private routes: Route[];

  constructor(deps: { commands: CommandDispatcher; pipeline: MessagePipeline }) {
    this.routes = [
      {
        name: 'blank',
        matches: msg => msg.text.trim() === '',
        handle: async () => {},
      },
      {
        name: 'command',
        matches: msg => isCommand(msg.text),
        handle: async (msg, transport) => {
          const reply = await deps.commands.dispatch(msg.text, {
            senderId: msg.senderId,
            conversationId: msg.conversationId,
            botUsername: msg.botUsername,
          });
          if (reply !== undefined) await transport.send(msg.conversationId, reply);
        },
      },
      {
        name: 'chat',
        matches: () => true,
        handle: async (msg, transport) => {
          await deps.pipeline.handle(msg, transport);
        },
      },
    ];
  }

  async route(msg: InboundMessage, transport: ReplyTransport): Promise<void> {
    const route = this.routes.find(r => r.matches(msg));
    if (!route) return;

    try {
      await route.handle(msg, transport);
    } catch (err) {
      log.error(`Router: ${route.name} handler failed for chat ${msg.conversationId}: ${log.errorMessage(err)}`);
    }
  }
}
