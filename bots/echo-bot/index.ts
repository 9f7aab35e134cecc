/**
 * Echo bot: repeats what it is told.
 *
 *   !echo <text...>   reply with the text
 *   anything else     reply with "Echo: <message>"
 */
import type { Message } from '@relaybot/chat-client';

import { argument, BaseBot, listArg } from '../../src/index.js';

export default class EchoBot extends BaseBot {
  protected registerCommands(): void {
    this.registry.register({
      name: 'echo',
      description: 'Echo back provided text',
      args: [argument('text', 'string', { multiple: true, description: 'Words to repeat' })],
      handler: (invocation) => {
        const text = listArg(invocation, 'text').join(' ');
        return text.length > 0 ? text : undefined;
      },
    });
  }

  async onMessage(message: Message): Promise<void> {
    this.logger.debug({ messageId: message.id }, 'Sending echo reply');
    await this.sendReply(message, `Echo: ${message.content}`);
  }
}
