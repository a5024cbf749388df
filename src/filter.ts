/**
 * Advertisement filtering and metric label resolution.
 */

import type { DeviceAllowList } from './models/devices';
import { GOVEE_NAME_PREFIX } from './protocol/constants';
import type { PayloadDecoder } from './protocol/decoders';
import { lookupDecoder, modelPrefix } from './protocol/registry';

/**
 * Why an advertisement was not processed.
 */
export enum RejectReason {
  /** Name lacks the Govee marker; not a supported device */
  UNRECOGNIZED_DEVICE = 'unrecognized-device',
  /** Allow-list is non-empty and does not name this device */
  NOT_ON_ALLOW_LIST = 'not-on-allow-list',
  /** No decoder is registered for the device's model prefix */
  NO_DECODER_FOR_MODEL = 'no-decoder-for-model',
}

export type ScanDecision =
  | { accepted: true; label: string; decoder: PayloadDecoder }
  | { accepted: false; reason: RejectReason };

/**
 * Decide whether to process an advertisement, and how to label its metrics.
 *
 * Checks run in order: Govee name marker, allow-list membership, decoder
 * registration for the model prefix.
 *
 * @param deviceIdentifier - Advertised device name, e.g. `GVH5075_ABCD`
 * @param devices - Configured allow-list (empty accepts all devices)
 */
export function resolveDevice(
  deviceIdentifier: string,
  devices: DeviceAllowList
): ScanDecision {
  if (!deviceIdentifier.startsWith(GOVEE_NAME_PREFIX)) {
    return { accepted: false, reason: RejectReason.UNRECOGNIZED_DEVICE };
  }

  const configuredLabel = devices.get(deviceIdentifier);

  if (configuredLabel === undefined && devices.size > 0) {
    return { accepted: false, reason: RejectReason.NOT_ON_ALLOW_LIST };
  }

  const decoder = lookupDecoder(modelPrefix(deviceIdentifier));

  if (!decoder) {
    return { accepted: false, reason: RejectReason.NO_DECODER_FOR_MODEL };
  }

  return {
    accepted: true,
    label: configuredLabel ?? deviceIdentifier,
    decoder,
  };
}
