/**
 * Passive BLE advertisement scanning over noble.
 *
 * The scanner never connects to peripherals: it only listens for
 * advertisements and hands them to the registered listener.
 */

import { ScannerError } from '../exceptions';
import type { Logger } from '../logger';
import { parseManufacturerData, type Advertisement } from '../models/advertisement';
import { POWER_ON_TIMEOUT_MS } from '../protocol/constants';

export type AdvertisementListener = (advertisement: Advertisement) => void;

/**
 * Source of advertisements driven by the scan loop.
 */
export interface AdvertisementSource {
  onAdvertisement(listener: AdvertisementListener): void;
  start(): Promise<void>;
  stop(): Promise<void>;
}

/**
 * Peripheral fields read from a noble `discover` event.
 */
export interface DiscoveredPeripheral {
  id: string;
  address: string;
  advertisement: {
    localName?: string;
    manufacturerData?: Buffer;
  };
}

/**
 * The part of the `@abandonware/noble` module the scanner uses.
 */
export interface NobleBinding {
  /** Current adapter state, e.g. `poweredOn` */
  state?: string;
  on(event: 'stateChange', listener: (state: string) => void): unknown;
  on(event: 'discover', listener: (peripheral: DiscoveredPeripheral) => void): unknown;
  startScanningAsync(serviceUUIDs?: string[], allowDuplicates?: boolean): Promise<void>;
  stopScanningAsync(): Promise<void>;
}

export interface NobleScannerOptions {
  /** How long `start()` waits for the adapter to power on (default: 15s) */
  powerOnTimeoutMs?: number;
}

/**
 * Convert a noble peripheral into an advertisement.
 */
export function toAdvertisement(peripheral: DiscoveredPeripheral): Advertisement {
  return {
    address: peripheral.address || peripheral.id,
    name: peripheral.advertisement.localName ?? '',
    manufacturerData: parseManufacturerData(peripheral.advertisement.manufacturerData),
  };
}

export class NobleScanner implements AdvertisementSource {
  private state: string;
  private scanning = false;
  private listeners: AdvertisementListener[] = [];
  private powerOnWaiters: Array<() => void> = [];
  private readonly powerOnTimeoutMs: number;

  constructor(
    private readonly noble: NobleBinding,
    private readonly logger: Logger,
    options: NobleScannerOptions = {}
  ) {
    this.powerOnTimeoutMs = options.powerOnTimeoutMs ?? POWER_ON_TIMEOUT_MS;
    this.state = noble.state ?? 'unknown';

    noble.on('stateChange', (state) => {
      this.logger.debug(`Bluetooth adapter state: ${state}`);
      this.state = state;

      if (state === 'poweredOn') {
        const waiters = this.powerOnWaiters;
        this.powerOnWaiters = [];
        waiters.forEach((waiter) => waiter());
      }
    });

    noble.on('discover', (peripheral) => this.handleDiscover(peripheral));
  }

  get isScanning(): boolean {
    return this.scanning;
  }

  onAdvertisement(listener: AdvertisementListener): void {
    this.listeners.push(listener);
  }

  /**
   * Wait for the adapter to power on, then start scanning with duplicates allowed.
   *
   * @throws {ScannerError} If the adapter does not power on in time or scanning fails
   */
  async start(): Promise<void> {
    if (this.scanning) return;

    await this.waitForPoweredOn();

    try {
      await this.noble.startScanningAsync([], true);
    } catch (error) {
      throw new ScannerError(`Failed to start scanning: ${describe(error)}`);
    }

    this.scanning = true;
    this.logger.debug('Scan started');
  }

  async stop(): Promise<void> {
    if (!this.scanning) return;

    this.scanning = false;

    try {
      await this.noble.stopScanningAsync();
    } catch (error) {
      throw new ScannerError(`Failed to stop scanning: ${describe(error)}`);
    }

    this.logger.debug('Scan stopped');
  }

  private handleDiscover(peripheral: DiscoveredPeripheral): void {
    const advertisement = toAdvertisement(peripheral);

    for (const listener of this.listeners) {
      listener(advertisement);
    }
  }

  private waitForPoweredOn(): Promise<void> {
    if (this.state === 'poweredOn') {
      return Promise.resolve();
    }

    return new Promise((resolve, reject) => {
      const timeoutId = setTimeout(() => {
        this.powerOnWaiters = this.powerOnWaiters.filter((w) => w !== waiter);
        reject(
          new ScannerError(
            `Bluetooth adapter not powered on after ${this.powerOnTimeoutMs}ms (state: ${this.state})`
          )
        );
      }, this.powerOnTimeoutMs);

      const waiter = () => {
        clearTimeout(timeoutId);
        resolve();
      };

      this.powerOnWaiters.push(waiter);
    });
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
