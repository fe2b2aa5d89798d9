export * from './engine.types';
export * from './error.types';
