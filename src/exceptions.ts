/**
 * Exception classes for the Govee exporter.
 */

export class GoveeExporterError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GoveeExporterError';
  }
}

/**
 * Manufacturer data could not be decoded (missing vendor key or short payload).
 */
export class DecodeError extends GoveeExporterError {
  constructor(message: string) {
    super(message);
    this.name = 'DecodeError';
  }
}

export class ConfigError extends GoveeExporterError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class ScannerError extends GoveeExporterError {
  constructor(message: string) {
    super(message);
    this.name = 'ScannerError';
  }
}
