/**
 * Latest-value gauges for decoded sensor readings.
 */

import { Gauge, type Registry } from 'prom-client';
import { celsiusToFahrenheit, type SensorReading } from '../models/reading';
import { MetricName } from '../protocol/constants';

const LABEL_NAMES = ['device', 'label'] as const;

type DeviceLabel = (typeof LABEL_NAMES)[number];

/**
 * Owns the four Govee gauge families in a caller-provided registry.
 *
 * Cells are created on the first update for a (device, label) pair and kept
 * for the life of the registry. Every update overwrites the previous value.
 *
 * @example
 * ```typescript
 * const registry = new Registry();
 * const sink = new MetricSink(registry);
 * sink.record('GVH5075_ABCD', 'Living Room', reading);
 * const body = await registry.metrics();
 * ```
 */
export class MetricSink {
  private readonly temperatureC: Gauge<DeviceLabel>;
  private readonly temperatureF: Gauge<DeviceLabel>;
  private readonly humidity: Gauge<DeviceLabel>;
  private readonly battery: Gauge<DeviceLabel>;

  constructor(registry: Registry) {
    const gauge = (name: MetricName, help: string): Gauge<DeviceLabel> =>
      new Gauge({
        name,
        help,
        labelNames: LABEL_NAMES,
        registers: [registry],
      });

    this.temperatureC = gauge(MetricName.TEMPERATURE_C, 'Govee Temperature (Celsius)');
    this.temperatureF = gauge(MetricName.TEMPERATURE_F, 'Govee Temperature (Fahrenheit)');
    this.humidity = gauge(MetricName.HUMIDITY, 'Govee Humidity %');
    this.battery = gauge(MetricName.BATTERY, 'Govee Battery Remaining %');
  }

  setTemperature(device: string, label: string, celsius: number, fahrenheit: number): void {
    this.temperatureC.set({ device, label }, celsius);
    this.temperatureF.set({ device, label }, fahrenheit);
  }

  setHumidity(device: string, label: string, pct: number): void {
    this.humidity.set({ device, label }, pct);
  }

  setBattery(device: string, label: string, pct: number): void {
    this.battery.set({ device, label }, pct);
  }

  /**
   * Apply every metric of a reading.
   *
   * @returns The temperature in Fahrenheit, as exported
   */
  record(device: string, label: string, reading: SensorReading): number {
    const fahrenheit = celsiusToFahrenheit(reading.temperatureC);

    this.setTemperature(device, label, reading.temperatureC, fahrenheit);
    this.setHumidity(device, label, reading.humidity);
    this.setBattery(device, label, reading.battery);

    return fahrenheit;
  }
}
