/**
 * Protocol layer exports for Govee sensor advertisements.
 */

export * from './constants';
export * from './decoders';
export * from './registry';
