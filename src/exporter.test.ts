import { Registry } from 'prom-client';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import { ScannerError } from './exceptions';
import { GoveeExporter, type GoveeExporterOptions } from './exporter';
import { RejectReason } from './filter';
import { Logger, LogLevel } from './logger';
import type { Advertisement } from './models/advertisement';
import { MetricSink } from './metrics/sink';
import { GOVEE_MANUFACTURER_ID, MetricName } from './protocol/constants';
import type { AdvertisementListener, AdvertisementSource } from './transport/scanner';

class FakeSource implements AdvertisementSource {
  private listeners: AdvertisementListener[] = [];
  start = vi.fn(async () => {});
  stop = vi.fn(async () => {});

  onAdvertisement(listener: AdvertisementListener): void {
    this.listeners.push(listener);
  }

  emit(advertisement: Advertisement): void {
    this.listeners.forEach((listener) => listener(advertisement));
  }
}

function advertisement(name: string, ...payload: number[]): Advertisement {
  return {
    address: 'a4:c1:38:00:00:01',
    name,
    manufacturerData: new Map([[GOVEE_MANUFACTURER_ID, Uint8Array.from(payload)]]),
  };
}

describe('GoveeExporter', () => {
  let registry: Registry;
  let source: FakeSource;
  let lines: string[];

  // Log lines without the timestamp prefix
  const messages = () => lines.map((line) => line.replace(/^\[[^\]]+\] /, ''));

  const samples = async (name: MetricName) =>
    (await registry.getSingleMetricAsString(name))
      .split('\n')
      .filter((line) => line.startsWith(`${name}{`));

  function createExporter(overrides: Partial<GoveeExporterOptions> = {}): GoveeExporter {
    return new GoveeExporter({
      source,
      sink: new MetricSink(registry),
      logger: new Logger({ level: LogLevel.DEBUG, write: (line) => lines.push(line) }),
      pollIntervalSecs: 30,
      ...overrides,
    });
  }

  beforeEach(() => {
    registry = new Registry();
    source = new FakeSource();
    lines = [];
  });

  describe('handleAdvertisement', () => {
    it('decodes and records an allow-listed device under its label', async () => {
      const exporter = createExporter({
        devices: new Map([['GVH5075_ABCD', 'Living Room']]),
      });

      const outcome = exporter.handleAdvertisement(
        advertisement('GVH5075_ABCD', 0x00, 0x01, 0x02, 0x03, 0x50)
      );

      expect(outcome).toEqual({
        status: 'recorded',
        label: 'Living Room',
        reading: { temperatureC: 6.6051, humidity: 5.1, battery: 80 },
        temperatureF: 43.89,
      });
      expect(await samples(MetricName.TEMPERATURE_C)).toEqual([
        'govee_temp_c_deg{device="GVH5075_ABCD",label="Living Room"} 6.6051',
      ]);
      expect(await samples(MetricName.TEMPERATURE_F)).toEqual([
        'govee_temp_f_deg{device="GVH5075_ABCD",label="Living Room"} 43.89',
      ]);
      expect(await samples(MetricName.HUMIDITY)).toEqual([
        'govee_humidity_pct{device="GVH5075_ABCD",label="Living Room"} 5.1',
      ]);
      expect(await samples(MetricName.BATTERY)).toEqual([
        'govee_battery_pct{device="GVH5075_ABCD",label="Living Room"} 80',
      ]);
      expect(messages()).toEqual([
        '[INFO] GVH5075_ABCD (Living Room): Temp = 6.6051C (43.89F), Humidity = 5.1%, Battery = 80%',
      ]);
    });

    it('labels devices by name when no allow-list is configured', async () => {
      const exporter = createExporter();

      exporter.handleAdvertisement(advertisement('GVH5072_0001', 0x00, 0x83, 0x41, 0x98, 0x64));

      expect(await samples(MetricName.TEMPERATURE_C)).toEqual([
        'govee_temp_c_deg{device="GVH5072_0001",label="GVH5072_0001"} -21.34',
      ]);
    });

    it('logs and skips devices missing from the allow-list', async () => {
      const exporter = createExporter({
        devices: new Map([['GVH5075_ABCD', 'Living Room']]),
      });

      const outcome = exporter.handleAdvertisement(
        advertisement('GVH5075_WXYZ', 0x00, 0x01, 0x02, 0x03, 0x50)
      );

      expect(outcome).toEqual({ status: 'rejected', reason: RejectReason.NOT_ON_ALLOW_LIST });
      expect(messages()).toEqual([
        `[INFO] Ignoring device "GVH5075_WXYZ". It's not on our scan list.`,
      ]);
      expect(await samples(MetricName.TEMPERATURE_C)).toEqual([]);
    });

    it('silently skips unrecognized devices and unsupported models', () => {
      const exporter = createExporter();

      expect(exporter.handleAdvertisement(advertisement('ABCD1234', 0, 1, 2, 3, 4))).toEqual({
        status: 'rejected',
        reason: RejectReason.UNRECOGNIZED_DEVICE,
      });
      expect(exporter.handleAdvertisement(advertisement('GVH5179_1234', 0, 1, 2, 3, 4))).toEqual({
        status: 'rejected',
        reason: RejectReason.NO_DECODER_FOR_MODEL,
      });
      expect(lines).toEqual([]);
    });

    it('drops malformed payloads without touching metrics', async () => {
      const exporter = createExporter();

      const outcome = exporter.handleAdvertisement(advertisement('GVH5075_ABCD', 0x00, 0x01));

      expect(outcome.status).toBe('malformed');
      expect(messages()).toEqual([
        '[DEBUG] Dropping advertisement from "GVH5075_ABCD": Payload too short: 2 bytes (need 5)',
      ]);
      expect(await samples(MetricName.HUMIDITY)).toEqual([]);
    });

    it('keeps processing after a malformed advertisement', async () => {
      const exporter = createExporter();

      exporter.handleAdvertisement({
        address: 'a4:c1:38:00:00:02',
        name: 'GVH5075_EFGH',
        manufacturerData: new Map(),
      });
      exporter.handleAdvertisement(advertisement('GVH5075_ABCD', 0x00, 0x01, 0x02, 0x03, 0x50));

      expect(await samples(MetricName.BATTERY)).toEqual([
        'govee_battery_pct{device="GVH5075_ABCD",label="GVH5075_ABCD"} 80',
      ]);
    });
  });

  it('handles advertisements delivered by the source', async () => {
    createExporter();

    source.emit(advertisement('GVH5075_ABCD', 0x00, 0x01, 0x02, 0x03, 0x50));

    expect(await samples(MetricName.HUMIDITY)).toEqual([
      'govee_humidity_pct{device="GVH5075_ABCD",label="GVH5075_ABCD"} 5.1',
    ]);
  });

  describe('run', () => {
    it('alternates start, poll interval and stop until aborted', async () => {
      const controller = new AbortController();
      const calls: string[] = [];
      let windows = 0;

      source.start.mockImplementation(async () => {
        calls.push('start');
      });
      source.stop.mockImplementation(async () => {
        calls.push('stop');
      });

      const exporter = createExporter({
        pollIntervalSecs: 15,
        sleep: async (ms) => {
          calls.push(`sleep ${ms}`);
          windows += 1;
          if (windows === 3) controller.abort();
        },
      });

      await exporter.run(controller.signal);

      expect(calls).toEqual([
        'start',
        'sleep 15000',
        'stop',
        'start',
        'sleep 15000',
        'stop',
        'start',
        'sleep 15000',
        'stop',
      ]);
    });

    it('logs the devices it scans for', async () => {
      const controller = new AbortController();
      controller.abort();
      const exporter = createExporter({
        devices: new Map([
          ['GVH5075_ABCD', 'Living Room'],
          ['GVH5072_0001', 'GVH5072_0001'],
        ]),
      });

      await exporter.run(controller.signal);

      expect(messages()).toEqual([
        '[INFO] Scanning for devices (GVH5072_0001;GVH5075_ABCD=Living Room)...',
      ]);
      expect(source.start).not.toHaveBeenCalled();
    });

    it('logs when scanning for all devices', async () => {
      const controller = new AbortController();
      controller.abort();

      await createExporter().run(controller.signal);

      expect(messages()).toEqual(['[INFO] Scanning for all devices...']);
    });

    it('keeps looping when the source fails to start or stop', async () => {
      const controller = new AbortController();
      let windows = 0;

      source.start.mockRejectedValueOnce(
        new ScannerError('Bluetooth adapter not powered on after 15000ms (state: poweredOff)')
      );
      source.stop.mockRejectedValueOnce(new Error('stop failed'));

      const exporter = createExporter({
        sleep: async () => {
          windows += 1;
          if (windows === 2) controller.abort();
        },
      });

      await exporter.run(controller.signal);

      expect(source.start).toHaveBeenCalledTimes(2);
      expect(source.stop).toHaveBeenCalledTimes(2);
      expect(messages()).toEqual([
        '[INFO] Scanning for all devices...',
        '[ERROR] Failed to start scan: Bluetooth adapter not powered on after 15000ms (state: poweredOff)',
        '[ERROR] Failed to stop scan: stop failed',
      ]);
    });

    it('cuts the scan window short when aborted', async () => {
      const controller = new AbortController();
      source.start.mockImplementation(async () => {
        setTimeout(() => controller.abort(), 5);
      });

      const exporter = createExporter({ pollIntervalSecs: 3600 });
      await exporter.run(controller.signal);

      expect(source.start).toHaveBeenCalledTimes(1);
      expect(source.stop).toHaveBeenCalledTimes(1);
    });
  });
});
