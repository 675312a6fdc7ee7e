/**
 * Configuration parameters.
 *
 * A Configuration is an immutable snapshot of string-keyed parameters built
 * once per session and passed explicitly to whatever needs it. Nothing in
 * the pipeline reads process-wide state on its own.
 *
 * Usage:
 *   const config = configurationFromEnv();
 *   const tracker = new UniqueIdTrackingListener(config);
 */

/** Enables the unique id tracking listener ("true", case-insensitive). */
export const TRACKING_ENABLED_KEY = 'uniqueid.tracking.enabled';
/** Directory the tracking listener writes into. */
export const TRACKING_OUTPUT_DIR_KEY = 'uniqueid.tracking.output.dir';
/** File name the tracking listener writes. */
export const TRACKING_OUTPUT_FILE_KEY = 'uniqueid.tracking.output.file';

export const DEFAULT_TRACKING_OUTPUT_DIR = 'build';
export const DEFAULT_TRACKING_OUTPUT_FILE = 'unique-test-ids.txt';

export interface Configuration {
  /** Raw value for a key, or undefined when absent. */
  get(key: string): string | undefined;
  /** "true" in any letter case is true; anything else, or absence, is the fallback. */
  getBoolean(key: string, fallback?: boolean): boolean;
  getString(key: string, fallback: string): string;
  keys(): string[];
}

/** Settings derived for the tracking listener. */
export interface TrackingConfig {
  enabled: boolean;
  outputDir: string;
  fileName: string;
}

/** Build a configuration from a plain map. Later edits to the map have no effect. */
export function createConfiguration(params: Record<string, string | undefined> = {}): Configuration {
  const values = new Map<string, string>();
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) values.set(key, value);
  }

  return {
    get: (key) => values.get(key),
    getBoolean: (key, fallback = false) => {
      const raw = values.get(key);
      if (raw === undefined) return fallback;
      return raw.toLowerCase() === 'true';
    },
    getString: (key, fallback) => {
      const raw = values.get(key);
      return raw === undefined || raw.trim() === '' ? fallback : raw;
    },
    keys: () => [...values.keys()],
  };
}

/** Environment variable carrying a parameter, e.g. UNIQUEID_TRACKING_ENABLED. */
export function envVarName(key: string): string {
  return key.toUpperCase().replace(/\./g, '_');
}

/** Read the known parameters from environment variables. */
export function configurationFromEnv(env: Record<string, string | undefined> = process.env): Configuration {
  const params: Record<string, string | undefined> = {};
  for (const key of [TRACKING_ENABLED_KEY, TRACKING_OUTPUT_DIR_KEY, TRACKING_OUTPUT_FILE_KEY]) {
    params[key] = env[envVarName(key)];
  }
  return createConfiguration(params);
}

export function resolveTrackingConfig(config: Configuration): TrackingConfig {
  return {
    enabled: config.getBoolean(TRACKING_ENABLED_KEY, false),
    outputDir: config.getString(TRACKING_OUTPUT_DIR_KEY, DEFAULT_TRACKING_OUTPUT_DIR),
    fileName: config.getString(TRACKING_OUTPUT_FILE_KEY, DEFAULT_TRACKING_OUTPUT_FILE),
  };
}
