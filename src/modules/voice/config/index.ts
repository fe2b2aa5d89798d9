export * from './voice.config';
