/**
 * BLE advertisement constants for Govee sensors.
 */

/** Company identifier Govee H5072/H5075 sensors advertise their readings under */
export const GOVEE_MANUFACTURER_ID = 0xec88;

/** Every supported sensor broadcasts a local name starting with this marker */
export const GOVEE_NAME_PREFIX = 'GVH';

// H5072/H5075 payload layout
export const H5075_VALUE_OFFSET = 1; // 24-bit big-endian temperature/humidity
export const H5075_BATTERY_OFFSET = 4;
export const H5075_MIN_PAYLOAD = 5;
export const TEMPERATURE_SIGN_FLAG = 0x800000;
export const TEMPERATURE_MAGNITUDE_MASK = 0x7fffff;

// Exporter defaults
export const DEFAULT_POLL_INTERVAL_SECS = 30;
export const DEFAULT_EXPORTER_PORT = 9889;
export const POWER_ON_TIMEOUT_MS = 15000;

/**
 * Gauge families exposed for scraping.
 */
export enum MetricName {
  TEMPERATURE_C = 'govee_temp_c_deg',
  TEMPERATURE_F = 'govee_temp_f_deg',
  HUMIDITY = 'govee_humidity_pct',
  BATTERY = 'govee_battery_pct',
}
