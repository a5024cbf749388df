#!/usr/bin/env node
/**
 * Command-line entry point: serve Govee sensor readings to Prometheus.
 */

// Required as-is: the module is a Noble instance with its methods on the prototype
import noble = require('@abandonware/noble');
import { ConfigError } from './exceptions';
import { main } from './main';
import { USAGE } from './options';

main(process.argv.slice(2), process.env, { noble })
  .then(() => process.exit(0))
  .catch((error: unknown) => {
    if (error instanceof ConfigError) {
      console.error(`Error: ${error.message}\n`);
      console.error(USAGE);
      process.exit(2);
    }
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  });
