/**
 * Device allow-list configuration.
 */

/**
 * Device identifiers to scan for, mapped to the label attached to their metrics.
 *
 * An empty allow-list accepts every supported device.
 */
export type DeviceAllowList = ReadonlyMap<string, string>;

/**
 * Parse `DEVICE[=LABEL]` arguments into an allow-list.
 *
 * The split happens on the first `=`, so labels may contain `=`. A missing or
 * empty label falls back to the device identifier. Repeated identifiers keep
 * the last label given.
 *
 * @example
 * ```typescript
 * parseDeviceList(['GVH5075_ABCD=Living Room', 'GVH5075_EFGH']);
 * // Map { 'GVH5075_ABCD' => 'Living Room', 'GVH5075_EFGH' => 'GVH5075_EFGH' }
 * ```
 */
export function parseDeviceList(pairs: readonly string[]): DeviceAllowList {
  const devices = new Map<string, string>();

  for (const pair of pairs) {
    const separator = pair.indexOf('=');
    const device = separator === -1 ? pair : pair.slice(0, separator);
    const label = separator === -1 ? '' : pair.slice(separator + 1);

    if (device) {
      devices.set(device, label || device);
    }
  }

  return devices;
}

/**
 * Describe an allow-list for logging, e.g. `GVH5072_0001;GVH5075_ABCD=Living Room`.
 *
 * Entries are sorted by identifier; the label is shown only when it differs.
 */
export function formatDeviceList(devices: DeviceAllowList): string {
  return Array.from(devices.entries())
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([device, label]) => (device === label ? device : `${device}=${label}`))
    .join(';');
}
