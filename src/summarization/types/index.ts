export * from './summarization.types';
