/**
 * Exporter process wiring: registry, sink, scrape server, scanner and scan loop.
 */

import { collectDefaultMetrics, Registry } from 'prom-client';
import { GoveeExporter } from './exporter';
import { Logger } from './logger';
import { close, createMetricsServer, listen } from './metrics/server';
import { MetricSink } from './metrics/sink';
import { parseOptions, USAGE } from './options';
import { NobleScanner, type NobleBinding } from './transport/scanner';

export interface MainOptions {
  /** BLE stack; the bin passes the `@abandonware/noble` module */
  noble: NobleBinding;

  /** Stops the exporter, in addition to SIGINT and SIGTERM */
  signal?: AbortSignal;

  /** Called once the scrape server is bound */
  onListening?: (port: number) => void;
}

/**
 * Run the exporter until SIGINT, SIGTERM or `options.signal`.
 *
 * @throws {ConfigError} If the arguments or environment are invalid
 */
export async function main(
  argv: readonly string[],
  env: NodeJS.ProcessEnv,
  options: MainOptions
): Promise<void> {
  const config = parseOptions(argv, env);

  if (config.help) {
    console.log(USAGE);
    return;
  }

  const logger = new Logger({ level: config.logLevel, filename: config.logFilename });

  // One registry shared by the update path and the scrape endpoint
  const registry = new Registry();
  collectDefaultMetrics({ register: registry });

  const exporter = new GoveeExporter({
    source: new NobleScanner(options.noble, logger),
    sink: new MetricSink(registry),
    logger,
    pollIntervalSecs: config.pollIntervalSecs,
    devices: config.devices,
  });

  const server = createMetricsServer(registry, logger);
  const port = await listen(server, config.port);
  logger.info(`Serving metrics on port ${port}`);
  options.onListening?.(port);

  const controller = new AbortController();
  const shutdown = (signal: NodeJS.Signals) => {
    logger.info(`Received ${signal}, shutting down`);
    controller.abort();
  };
  const abort = () => controller.abort();

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
  if (options.signal?.aborted) {
    controller.abort();
  } else {
    options.signal?.addEventListener('abort', abort, { once: true });
  }

  try {
    await exporter.run(controller.signal);
  } finally {
    process.off('SIGINT', shutdown);
    process.off('SIGTERM', shutdown);
    options.signal?.removeEventListener('abort', abort);
    await close(server);
    await logger.close();
  }
}
