/**
 * Environment variable utilities
 */

/**
 * Gets an environment variable as a string with a default value
 * @param k - Environment variable key
 * @param d - Default value if variable is not set or blank
 */
export const envStr = (k: string, d: string): string => {
  const v = process.env[k]?.trim();
  return v ? v : d;
};

/**
 * Gets an environment variable as an integer with a default value
 * @param k - Environment variable key
 * @param d - Default value if variable is not set or invalid
 */
export const envInt = (k: string, d: number): number => {
  const v = process.env[k];
  if (!v) return d;
  const n = parseInt(v, 10);
  return Number.isFinite(n) ? n : d;
};

/**
 * Gets an environment variable as a boolean with a default value
 * @param k - Environment variable key
 * @param d - Default value if variable is not set
 * @returns true for "1", "true", "yes", "on"; false otherwise
 */
export const envBool = (k: string, d: boolean): boolean =>
  /^(1|true|yes|on)$/i.test(process.env[k] ?? String(d));
