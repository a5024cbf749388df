/**
 * Command-line and environment configuration.
 */

import { ConfigError } from './exceptions';
import { LogLevel, isLogLevelName, LOG_LEVEL_NAMES } from './logger';
import { parseDeviceList, type DeviceAllowList } from './models/devices';
import { DEFAULT_EXPORTER_PORT, DEFAULT_POLL_INTERVAL_SECS } from './protocol/constants';

export interface ExporterOptions {
  port: number;
  pollIntervalSecs: number;
  devices: DeviceAllowList;
  logLevel: LogLevel;
  logFilename?: string;
  help: boolean;
}

export const USAGE = `govee-prometheus-exporter [options] [DEVICE[=LABEL] ...]

Provide Govee sensor data to Prometheus.

Devices to scan for can be given a label, which shows up in Prometheus and
tools like Grafana. For example: "GVH5075_ABCD=Living Room" GVH5075_EFGH=Office
If no devices are provided, all available devices are exported.

Options:
  -p, --port <port>            HTTP port to serve for Prometheus, 0 for any free port (default: ${DEFAULT_EXPORTER_PORT})
  -i, --poll-interval <secs>   Length of each scan window in seconds (default: ${DEFAULT_POLL_INTERVAL_SECS})
  --log-level <level>          ${LOG_LEVEL_NAMES.join(', ')} (default: WARNING)
                               Choose INFO to show scanning information.
  --log-filename <path>        Log to this file instead of standard out
  -h, --help                   Show this help

Environment:
  PORT, POLL_INTERVAL, LOG_LEVEL, LOG_FILENAME, DEVICES (space-separated,
  quotes allowed) are used when the matching option is not given.
`;

const VALUE_FLAGS: Record<string, 'port' | 'pollInterval' | 'logLevel' | 'logFilename'> = {
  '-p': 'port',
  '--port': 'port',
  '-i': 'pollInterval',
  '--poll-interval': 'pollInterval',
  '--log-level': 'logLevel',
  '--log-filename': 'logFilename',
};

/**
 * Parse exporter options from arguments, falling back to environment variables.
 *
 * @param argv - Arguments after the script name
 * @param env - Environment variables (e.g. `process.env`)
 * @throws {ConfigError} On unknown options, missing values or invalid values
 */
export function parseOptions(
  argv: readonly string[],
  env: Readonly<Record<string, string | undefined>> = {}
): ExporterOptions {
  const values: Partial<Record<(typeof VALUE_FLAGS)[string], string>> = {};
  const positional: string[] = [];
  let help = false;
  let optionsEnded = false;

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];

    if (optionsEnded || !arg.startsWith('-') || arg === '-') {
      positional.push(arg);
      continue;
    }

    if (arg === '--') {
      optionsEnded = true;
      continue;
    }

    if (arg === '-h' || arg === '--help') {
      help = true;
      continue;
    }

    const eq = arg.indexOf('=');
    const flag = eq === -1 ? arg : arg.slice(0, eq);
    const key = VALUE_FLAGS[flag];

    if (!key) {
      throw new ConfigError(`Unknown option: ${flag}`);
    }

    if (eq !== -1) {
      values[key] = arg.slice(eq + 1);
    } else {
      const next = argv[i + 1];
      if (next === undefined) {
        throw new ConfigError(`Option ${flag} requires a value`);
      }
      values[key] = next;
      i += 1;
    }
  }

  const deviceArgs =
    positional.length > 0 ? positional : splitArguments(env.DEVICES ?? '');

  const logFilename = values.logFilename ?? env.LOG_FILENAME;

  return {
    port: parsePort(values.port ?? env.PORT),
    pollIntervalSecs: parsePollInterval(values.pollInterval ?? env.POLL_INTERVAL),
    devices: parseDeviceList(deviceArgs),
    logLevel: parseLogLevel(values.logLevel ?? env.LOG_LEVEL),
    ...(logFilename ? { logFilename } : {}),
    help,
  };
}

function parseInteger(raw: string, what: string): number {
  if (!/^\d+$/.test(raw.trim())) {
    throw new ConfigError(`Invalid ${what}: "${raw}" (expected a whole number)`);
  }
  return Number.parseInt(raw, 10);
}

function parsePort(raw: string | undefined): number {
  if (raw === undefined || raw === '') return DEFAULT_EXPORTER_PORT;

  const port = parseInteger(raw, 'port');
  if (port > 65535) {
    throw new ConfigError(`Invalid port: ${port} (must be 0-65535)`);
  }
  return port;
}

function parsePollInterval(raw: string | undefined): number {
  if (raw === undefined || raw === '') return DEFAULT_POLL_INTERVAL_SECS;

  const secs = parseInteger(raw, 'poll interval');
  if (secs < 1) {
    throw new ConfigError(`Invalid poll interval: ${secs} (must be at least 1 second)`);
  }
  return secs;
}

function parseLogLevel(raw: string | undefined): LogLevel {
  if (raw === undefined || raw === '') return LogLevel.WARNING;

  const name = raw.toUpperCase();
  if (!isLogLevelName(name)) {
    throw new ConfigError(
      `Invalid log level: "${raw}" (choose from ${LOG_LEVEL_NAMES.join(', ')})`
    );
  }
  return LogLevel[name];
}

/**
 * Split a space-separated argument string, honouring single and double quotes.
 *
 * `GVH5075_ABCD="Living Room" GVH5075_EFGH` yields
 * `['GVH5075_ABCD=Living Room', 'GVH5075_EFGH']`.
 */
export function splitArguments(value: string): string[] {
  const args: string[] = [];
  let current = '';
  let inToken = false;
  let quote: '"' | "'" | null = null;

  for (const ch of value) {
    if (quote) {
      if (ch === quote) {
        quote = null;
      } else {
        current += ch;
      }
    } else if (ch === '"' || ch === "'") {
      quote = ch;
      inToken = true;
    } else if (/\s/.test(ch)) {
      if (inToken) {
        args.push(current);
        current = '';
        inToken = false;
      }
    } else {
      current += ch;
      inToken = true;
    }
  }

  if (quote) {
    throw new ConfigError(`Unterminated quote in "${value}"`);
  }

  if (inToken) {
    args.push(current);
  }

  return args;
}
