export * from './bot.types';
