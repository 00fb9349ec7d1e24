/**
 * Environment Configuration Utilities
 */

/**
 * Read a single environment value. Booleans and integers are inferred from the
 * default; a parser that throws falls back to the default.
 */
export function getConfig(key: string, defaultValue: number): number;
export function getConfig(key: string, defaultValue: boolean): boolean;
export function getConfig(key: string, defaultValue: string): string;
export function getConfig<T>(key: string, defaultValue: T, parser: (value: string) => T): T;
export function getConfig(key: string, defaultValue: unknown, parser?: (value: string) => unknown): unknown {
  const value = process.env[key];

  if (value === undefined || value === '') {
    return defaultValue;
  }

  if (parser) {
    try {
      return parser(value);
    } catch {
      return defaultValue;
    }
  }

  if (typeof defaultValue === 'boolean') {
    return value.toLowerCase() === 'true';
  }

  if (typeof defaultValue === 'number') {
    const parsed = parseInt(value, 10);
    return isNaN(parsed) ? defaultValue : parsed;
  }

  return value;
}
