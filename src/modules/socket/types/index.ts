/**
 * Socket Module Types
 */

export * from './session';
export * from './messages';
