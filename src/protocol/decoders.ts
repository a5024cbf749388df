/**
 * Payload decoders for Govee sensor advertisements.
 */

import { DecodeError } from '../exceptions';
import type { ManufacturerData } from '../models/advertisement';
import type { SensorReading } from '../models/reading';
import {
  GOVEE_MANUFACTURER_ID,
  H5075_BATTERY_OFFSET,
  H5075_MIN_PAYLOAD,
  H5075_VALUE_OFFSET,
  TEMPERATURE_MAGNITUDE_MASK,
  TEMPERATURE_SIGN_FLAG,
} from './constants';

/**
 * Decodes the manufacturer data of one sensor model into a reading.
 */
export interface PayloadDecoder {
  /** Human-readable model name, used in log output */
  readonly model: string;

  /**
   * @throws {DecodeError} If the manufacturer data does not hold a valid payload
   */
  decode(manufacturerData: ManufacturerData): SensorReading;
}

/**
 * Decode a Govee H5072/H5075 temperature/humidity advertisement.
 *
 * Payload format (under company identifier 0xEC88):
 *
 * - [0]: Unknown (padding)
 * - [1-3]: Temperature and humidity (24-bit big-endian)
 *   - bit 23: temperature sign
 *   - bits 0-22: magnitude M; temperature = M / 10000, humidity = (M % 1000) / 10
 * - [4]: Battery remaining in percent
 * - [5]: Unknown (padding, optional)
 *
 * Values are not range-checked. Weak or corrupted transmissions can produce
 * implausible temperatures; those are reported as decoded.
 *
 * @param manufacturerData - Manufacturer data from the advertisement
 * @returns Decoded reading
 * @throws {DecodeError} If the 0xEC88 entry is missing or shorter than 5 bytes
 */
export function decodeH5075(manufacturerData: ManufacturerData): SensorReading {
  const payload = manufacturerData.get(GOVEE_MANUFACTURER_ID);

  if (!payload) {
    throw new DecodeError(
      `No manufacturer data for company 0x${GOVEE_MANUFACTURER_ID.toString(16)}`
    );
  }

  if (payload.length < H5075_MIN_PAYLOAD) {
    throw new DecodeError(
      `Payload too short: ${payload.length} bytes (need ${H5075_MIN_PAYLOAD})`
    );
  }

  const value =
    (payload[H5075_VALUE_OFFSET] << 16) |
    (payload[H5075_VALUE_OFFSET + 1] << 8) |
    payload[H5075_VALUE_OFFSET + 2];

  const isNegative = (value & TEMPERATURE_SIGN_FLAG) !== 0;
  const magnitude = value & TEMPERATURE_MAGNITUDE_MASK;

  const temperature = magnitude / 10000;

  return {
    temperatureC: isNegative ? -temperature : temperature,
    humidity: (magnitude % 1000) / 10,
    battery: payload[H5075_BATTERY_OFFSET],
  };
}

export const H5075_DECODER: PayloadDecoder = {
  model: 'H5072/H5075',
  decode: decodeH5075,
};
