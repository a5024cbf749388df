/**
 * Decoded sensor reading.
 */
export interface SensorReading {
  /** Temperature in Celsius, 4 decimal digits of precision */
  temperatureC: number;

  /** Relative humidity (0-100), 1 decimal digit of precision */
  humidity: number;

  /** Battery remaining as a raw percentage */
  battery: number;
}

/**
 * Convert Celsius to Fahrenheit, rounded to 2 decimal places.
 */
export function celsiusToFahrenheit(celsius: number): number {
  return Number((32 + (9 * celsius) / 5).toFixed(2));
}
