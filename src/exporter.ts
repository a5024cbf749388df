/**
 * Govee sensor exporter: routes advertisements into metrics and drives the scan loop.
 */

import { DecodeError } from './exceptions';
import { RejectReason, resolveDevice } from './filter';
import type { Logger } from './logger';
import type { Advertisement } from './models/advertisement';
import { formatDeviceList, type DeviceAllowList } from './models/devices';
import type { SensorReading } from './models/reading';
import type { MetricSink } from './metrics/sink';
import type { AdvertisementSource } from './transport/scanner';

/**
 * Result of handling one advertisement.
 */
export type ProcessOutcome =
  | { status: 'recorded'; label: string; reading: SensorReading; temperatureF: number }
  | { status: 'rejected'; reason: RejectReason }
  | { status: 'malformed'; error: DecodeError };

/** Resolves after `ms`, or early once `signal` aborts */
export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface GoveeExporterOptions {
  source: AdvertisementSource;
  sink: MetricSink;
  logger: Logger;

  /** Length of each scan window in seconds */
  pollIntervalSecs: number;

  /** Devices to scan for, mapped to labels (empty: all devices) */
  devices?: DeviceAllowList;

  /** Waits out a scan window (default: setTimeout) */
  sleep?: Sleep;
}

const defaultSleep: Sleep = (ms, signal) =>
  new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }

    const onAbort = () => {
      clearTimeout(timeoutId);
      resolve();
    };
    const timeoutId = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });

/**
 * Exporter for Govee H5072/H5075 temperature/humidity sensors.
 *
 * Listens for advertisements from the source, decodes those from supported
 * devices and writes the readings to the metric sink:
 *
 * - `govee_temp_c_deg`: Temperature (Celsius)
 * - `govee_temp_f_deg`: Temperature (Fahrenheit)
 * - `govee_humidity_pct`: Humidity (0-100)
 * - `govee_battery_pct`: Battery remaining (0-100)
 *
 * Each is labelled with `device` (advertised name) and `label`.
 */
export class GoveeExporter {
  readonly pollIntervalSecs: number;
  readonly devices: DeviceAllowList;
  private readonly source: AdvertisementSource;
  private readonly sink: MetricSink;
  private readonly logger: Logger;
  private readonly sleep: Sleep;

  constructor(options: GoveeExporterOptions) {
    this.source = options.source;
    this.sink = options.sink;
    this.logger = options.logger;
    this.pollIntervalSecs = options.pollIntervalSecs;
    this.devices = options.devices ?? new Map<string, string>();
    this.sleep = options.sleep ?? defaultSleep;

    this.source.onAdvertisement((advertisement) => {
      this.handleAdvertisement(advertisement);
    });
  }

  /**
   * Decode one advertisement and update metrics if it comes from a wanted device.
   *
   * Rejected and malformed advertisements skip the update and leave metrics as they were.
   */
  handleAdvertisement(advertisement: Advertisement): ProcessOutcome {
    const { name } = advertisement;
    const decision = resolveDevice(name, this.devices);

    if (!decision.accepted) {
      if (decision.reason === RejectReason.NOT_ON_ALLOW_LIST) {
        this.logger.info(`Ignoring device "${name}". It's not on our scan list.`);
      }
      return { status: 'rejected', reason: decision.reason };
    }

    let reading: SensorReading;

    try {
      reading = decision.decoder.decode(advertisement.manufacturerData);
    } catch (error) {
      if (error instanceof DecodeError) {
        this.logger.debug(`Dropping advertisement from "${name}": ${error.message}`);
        return { status: 'malformed', error };
      }
      throw error;
    }

    const { label } = decision;
    const temperatureF = this.sink.record(name, label, reading);

    this.logger.info(
      `${name} (${label}): Temp = ${reading.temperatureC}C (${temperatureF}F), ` +
        `Humidity = ${reading.humidity}%, Battery = ${reading.battery}%`
    );

    return { status: 'recorded', label, reading, temperatureF };
  }

  /**
   * Scan in consecutive windows of `pollIntervalSecs` until the signal aborts.
   *
   * Each window starts discovery, waits, then stops it; the next window starts
   * right away. Failures to start or stop are logged and the loop continues.
   */
  async run(signal?: AbortSignal): Promise<void> {
    if (this.devices.size > 0) {
      this.logger.info(`Scanning for devices (${formatDeviceList(this.devices)})...`);
    } else {
      this.logger.info('Scanning for all devices...');
    }

    while (!signal?.aborted) {
      await this.scanWindow(signal);
    }
  }

  private async scanWindow(signal?: AbortSignal): Promise<void> {
    try {
      await this.source.start();
    } catch (error) {
      this.logger.error(`Failed to start scan: ${describe(error)}`);
    }

    await this.sleep(this.pollIntervalSecs * 1000, signal);

    try {
      await this.source.stop();
    } catch (error) {
      this.logger.error(`Failed to stop scan: ${describe(error)}`);
    }
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
