/**
 * govee-prometheus-exporter - Prometheus exporter for Govee BLE thermometers
 *
 * Library entry point. The `govee-prometheus-exporter` binary lives in `cli.ts`.
 */

// Exporter and its collaborators
export { GoveeExporter } from './exporter';
export type { GoveeExporterOptions, ProcessOutcome, Sleep } from './exporter';
export { resolveDevice, RejectReason } from './filter';
export type { ScanDecision } from './filter';
export { MetricSink } from './metrics/sink';
export { createMetricsServer, listen, close } from './metrics/server';
export { NobleScanner, toAdvertisement } from './transport/scanner';
export type {
  AdvertisementListener,
  AdvertisementSource,
  DiscoveredPeripheral,
  NobleBinding,
  NobleScannerOptions,
} from './transport/scanner';

// Models and protocol
export * from './models';
export * from './protocol';

// Configuration and logging
export { parseOptions, splitArguments, USAGE } from './options';
export type { ExporterOptions } from './options';
export * from './logger';

// Exceptions
export * from './exceptions';

// Process wiring
export { main } from './main';
export type { MainOptions } from './main';
