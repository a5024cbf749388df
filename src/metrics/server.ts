/**
 * HTTP endpoint serving the metrics registry for Prometheus to scrape.
 */

import http from 'http';
import type { Registry } from 'prom-client';
import type { Logger } from '../logger';

/**
 * Create (but do not start) the scrape server.
 *
 * Any GET or HEAD path returns the registry in Prometheus text format; other
 * methods get 405.
 */
export function createMetricsServer(registry: Registry, logger: Logger): http.Server {
  return http.createServer((req, res) => {
    if (req.method !== 'GET' && req.method !== 'HEAD') {
      res.writeHead(405, { Allow: 'GET, HEAD' });
      res.end();
      return;
    }

    registry
      .metrics()
      .then((body) => {
        res.writeHead(200, { 'Content-Type': registry.contentType });
        res.end(req.method === 'HEAD' ? undefined : body);
      })
      .catch((error: unknown) => {
        const message = error instanceof Error ? error.message : String(error);
        logger.error(`Failed to render metrics: ${message}`);
        res.writeHead(500, { 'Content-Type': 'text/plain' });
        res.end(message);
      });
  });
}

/**
 * Start listening on all interfaces.
 *
 * @returns The bound port (useful when `port` is 0)
 */
export function listen(server: http.Server, port: number): Promise<number> {
  return new Promise((resolve, reject) => {
    const onError = (error: Error) => reject(error);

    server.once('error', onError);
    server.listen(port, () => {
      server.removeListener('error', onError);
      const address = server.address();
      resolve(typeof address === 'object' && address ? address.port : port);
    });
  });
}

export function close(server: http.Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}
