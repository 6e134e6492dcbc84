/**
 * Bot Module
 * Telegram client, command replies and the document request handler
 */

import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { DocumentsModule } from '../documents/documents.module';
import { SummarizationModule } from '../summarization/summarization.module';
import { BotService } from './bot.service';
import { CommandsHandler } from './handlers/commands.handler';
import { DocumentHandler } from './handlers/document.handler';

@Module({
  imports: [ConfigModule, DocumentsModule, SummarizationModule],
  providers: [BotService, CommandsHandler, DocumentHandler],
  exports: [BotService],
})
export class BotModule {}
