/**
 * BLE advertisement data structures.
 */

/**
 * Manufacturer-specific data keyed by company identifier.
 *
 * Values hold the payload only; the 2-byte company identifier that precedes it
 * on air is already stripped and used as the key.
 */
export type ManufacturerData = ReadonlyMap<number, Uint8Array>;

/**
 * A single advertisement received during a scan window.
 */
export interface Advertisement {
  /** Peripheral address (or platform id where the address is hidden) */
  address: string;

  /** Advertised local name, empty when the peripheral sends none */
  name: string;

  manufacturerData: ManufacturerData;
}

/**
 * Split a raw manufacturer-specific AD field into company identifier and payload.
 *
 * Raw format:
 *
 * - [0-1]: Company identifier (little-endian uint16)
 * - [2-]: Vendor payload
 *
 * @param raw - Manufacturer data as delivered by the BLE stack, if any
 * @returns Map with a single entry, or an empty map if the field is absent or too short
 */
export function parseManufacturerData(raw: Uint8Array | undefined): ManufacturerData {
  const data = new Map<number, Uint8Array>();

  if (!raw || raw.length < 2) {
    return data;
  }

  const view = new DataView(raw.buffer, raw.byteOffset, raw.byteLength);
  const companyId = view.getUint16(0, true);
  data.set(companyId, raw.subarray(2));

  return data;
}
