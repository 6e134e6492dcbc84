import { Injectable } from '@nestjs/common';
import { BOT_MESSAGES } from '../constants/bot-messages';
import type { BotCommand } from '../types';

const COMMAND_REPLIES: Record<BotCommand, string> = {
  start: BOT_MESSAGES.GREETING,
  help: BOT_MESSAGES.HELP,
};

export const BOT_COMMANDS: readonly BotCommand[] = ['start', 'help'];

/**
 * Text replies for slash commands; anything unrecognized gets the fallback
 */
@Injectable()
export class CommandsHandler {
  getReply(command: string): string {
    const name = command.replace(/^\//, '').split('@')[0].toLowerCase();
    return this.isKnownCommand(name)
      ? COMMAND_REPLIES[name]
      : BOT_MESSAGES.UNKNOWN_COMMAND;
  }

  isKnownCommand(name: string): name is BotCommand {
    return Object.prototype.hasOwnProperty.call(COMMAND_REPLIES, name);
  }
}
