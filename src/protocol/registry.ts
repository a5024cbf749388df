/**
 * Decoder lookup by device model.
 *
 * Govee sensors advertise names like `GVH5075_ABCD`: the model prefix before
 * the underscore selects the payload layout. Support for another model is a
 * new entry here.
 */

import { H5075_DECODER, type PayloadDecoder } from './decoders';

export const DEVICE_DECODERS: ReadonlyMap<string, PayloadDecoder> = new Map([
  ['GVH5072', H5075_DECODER],
  ['GVH5075', H5075_DECODER],
]);

/**
 * Model prefix of a device identifier (text before the first underscore).
 */
export function modelPrefix(deviceIdentifier: string): string {
  const separator = deviceIdentifier.indexOf('_');
  return separator === -1 ? deviceIdentifier : deviceIdentifier.slice(0, separator);
}

export function lookupDecoder(prefix: string): PayloadDecoder | undefined {
  return DEVICE_DECODERS.get(prefix);
}
