export * from './session.config';
