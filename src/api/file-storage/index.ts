/**
 * File storage module.
 */

export * from './types.ts';
export * from './local-storage.ts';
export * from './image.ts';
