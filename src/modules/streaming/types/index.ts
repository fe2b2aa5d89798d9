export * from './request.types';
export * from './metrics.types';
export * from './error.types';
export * from './outcome.types';
