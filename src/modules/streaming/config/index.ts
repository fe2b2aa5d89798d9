export * from './streaming.constants';
