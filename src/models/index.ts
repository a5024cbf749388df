/**
 * Models layer exports.
 */

export * from './advertisement';
export * from './devices';
export * from './reading';
