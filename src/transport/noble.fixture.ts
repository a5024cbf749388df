/**
 * In-process stand-in for the noble module, for tests.
 */

import { EventEmitter } from 'events';
import { vi } from 'vitest';
import type { DiscoveredPeripheral } from './scanner';

export class FakeNoble extends EventEmitter {
  state = 'unknown';
  startScanningAsync = vi.fn(async (_serviceUUIDs?: string[], _allowDuplicates?: boolean) => {});
  stopScanningAsync = vi.fn(async () => {});

  powerOn(): void {
    this.state = 'poweredOn';
    this.emit('stateChange', 'poweredOn');
  }
}

export const GOVEE_PERIPHERAL: DiscoveredPeripheral = {
  id: 'a4c138000001',
  address: 'a4:c1:38:00:00:01',
  advertisement: {
    localName: 'GVH5075_ABCD',
    manufacturerData: Buffer.from([0x88, 0xec, 0x00, 0x01, 0x02, 0x03, 0x50, 0x00]),
  },
};
