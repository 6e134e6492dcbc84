/**
 * Bot Service
 *
 * Owns the grammY client: registers command and document handlers,
 * long-polls for updates and stops polling on shutdown.
 */

import {
  Injectable,
  Logger,
  type OnApplicationShutdown,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Bot, GrammyError, HttpError, type Context, type Filter } from 'grammy';
import { MissingBotTokenError } from '../shared/errors/bot-error';
import { FileUnavailableError } from '../documents/errors/retrieval-errors';
import { BOT_MESSAGES } from './constants/bot-messages';
import { BOT_COMMANDS, CommandsHandler } from './handlers/commands.handler';
import { DocumentHandler } from './handlers/document.handler';
import type { InboundDocumentEvent, Replier } from './types';
import { splitMessage } from './utils/split-message';

type DocumentContext = Filter<Context, 'message:document'>;

@Injectable()
export class BotService implements OnApplicationShutdown {
  private readonly logger = new Logger(BotService.name);
  private readonly token: string | null;
  private readonly apiRoot: string;
  private bot: Bot | null = null;

  constructor(
    private readonly configService: ConfigService,
    private readonly documentHandler: DocumentHandler,
    private readonly commandsHandler: CommandsHandler,
  ) {
    this.token =
      this.configService.get<string>('TELEGRAM_BOT_TOKEN')?.trim() || null;
    this.apiRoot = (
      this.configService.get<string>('TELEGRAM_API_ROOT') ||
      'https://api.telegram.org'
    ).replace(/\/+$/, '');
  }

  isConfigured(): boolean {
    return this.token !== null;
  }

  /**
   * Start long polling. Resolves once polling stops.
   * @returns false when TELEGRAM_BOT_TOKEN is missing and nothing was started
   */
  async start(): Promise<boolean> {
    if (!this.token) {
      this.logger.error(new MissingBotTokenError().message);
      return false;
    }

    this.bot = this.createBot(this.token);

    this.logger.log('Bot is starting polling...');
    await this.bot.start({
      allowed_updates: ['message'],
      onStart: (botInfo) => {
        this.logger.log(`Bot @${botInfo.username} is polling for updates`);
      },
    });

    this.logger.log('Bot polling stopped');
    return true;
  }

  async onApplicationShutdown(signal?: string): Promise<void> {
    if (this.bot?.isRunning()) {
      this.logger.log(`Stopping bot (${signal ?? 'shutdown'})`);
      await this.bot.stop();
    }
  }

  /**
   * Download URL of a file on the Bot API file endpoint
   */
  buildFileUrl(token: string, filePath: string): string {
    return `${this.apiRoot}/file/bot${token}/${filePath}`;
  }

  /**
   * Build a client with every handler registered. Polling is not started.
   */
  createBot(token: string): Bot {
    const bot = new Bot(token, {
      client: { apiRoot: this.apiRoot },
    });

    for (const command of BOT_COMMANDS) {
      bot.command(command, (ctx) =>
        this.createReplier(ctx).reply(this.commandsHandler.getReply(command)),
      );
    }

    bot.on('message:document', (ctx) => this.onDocument(ctx, token));

    bot.on('message::bot_command', (ctx) =>
      this.createReplier(ctx).reply(BOT_MESSAGES.UNKNOWN_COMMAND),
    );

    bot.catch((err) => {
      const error = err.error;
      if (error instanceof GrammyError) {
        this.logger.error(
          `Telegram API error while handling update ${err.ctx.update.update_id}: ${error.description}`,
        );
      } else if (error instanceof HttpError) {
        this.logger.error(
          `Could not contact Telegram while handling update ${err.ctx.update.update_id}`,
          error.stack,
        );
      } else {
        this.logger.error(
          `Unhandled error while handling update ${err.ctx.update.update_id}`,
          error instanceof Error ? error.stack : String(error),
        );
      }
    });

    return bot;
  }

  private async onDocument(ctx: DocumentContext, token: string): Promise<void> {
    const document = ctx.message.document;

    const event: InboundDocumentEvent = {
      fileId: document.file_id,
      mimeType: document.mime_type,
      fileName: document.file_name,
      fileSize: document.file_size,
      resolveDownloadUrl: async () => {
        const file = await ctx.getFile();
        if (!file.file_path) {
          throw new FileUnavailableError(document.file_id);
        }
        return this.buildFileUrl(token, file.file_path);
      },
    };

    await this.documentHandler.handle(event, this.createReplier(ctx));
  }

  private createReplier(ctx: Context): Replier {
    return {
      reply: async (text: string) => {
        for (const part of splitMessage(text)) {
          await ctx.reply(part);
        }
      },
    };
  }
}
