export * from './document.types';
