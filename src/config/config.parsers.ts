import { BOOLEAN_TRUE_VALUES } from './config.constants';

export function parseOptionalBoolean(value: string | undefined, defaultValue = false): boolean {
  if (value === undefined) {
    return defaultValue;
  }

  const normalized = value.trim().toLowerCase();
  if (BOOLEAN_TRUE_VALUES.includes(normalized)) {
    return true;
  }

  if (normalized === 'false' || normalized === '0') {
    return false;
  }

  return defaultValue;
}

export function parseNumberWithDefault(value: string | undefined, defaultValue: number): number {
  if (value === undefined || value === '') {
    return defaultValue;
  }

  const parsed = Number(value);

  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new Error(`Invalid numeric value: "${value}" (must be a non-negative finite number)`);
  }

  // Ensure integer for configuration values (ports, intervals)
  if (!Number.isInteger(parsed)) {
    throw new Error(`Invalid numeric value: "${value}" (must be an integer)`);
  }

  return parsed;
}

/**
 * Parses a string environment variable with a default value.
 *
 * Returns the provided value if present, otherwise returns the default.
 * Used for optional string configuration values.
 *
 * @param value - The string value to parse
 * @param defaultValue - The default value to return if not provided
 * @returns The value or default
 */
export function parseStringWithDefault(value: string | undefined, defaultValue: string): string {
  if (value === undefined || value === '') {
    return defaultValue;
  }
  return value;
}

/**
 * Splits a command line from the environment into an argv array.
 *
 * Arguments are separated by whitespace; no shell quoting is interpreted,
 * so commands are executed without a shell.
 *
 * @example
 * ```
 * STEWARD_CLIENT_INSTALL_COMMAND="apt-get install -y certbot"
 * // Returns: ['apt-get', 'install', '-y', 'certbot']
 * ```
 */
export function parseCommand(value: string | undefined, defaultValue = ''): string[] {
  const command = value === undefined ? defaultValue : value;

  return command
    .trim()
    .split(/\s+/)
    .filter((part) => part.length > 0);
}

/**
 * Parses a comma-separated list of hours of the day (0-23).
 *
 * @throws {Error} If the list is empty or contains a value outside 0-23
 */
export function parseHourList(value: string | undefined, defaultHours: number[]): number[] {
  if (value === undefined || !value.trim()) {
    return [...defaultHours];
  }

  const hours = value
    .split(',')
    .map((hour) => hour.trim())
    .filter((hour) => hour.length > 0)
    .map((hour) => Number(hour));

  if (hours.length === 0 || hours.some((hour) => !Number.isInteger(hour) || hour < 0 || hour > 23)) {
    throw new Error(`Invalid hour list: "${value}" (expected comma-separated integers between 0 and 23)`);
  }

  return [...new Set(hours)].sort((a, b) => a - b);
}
