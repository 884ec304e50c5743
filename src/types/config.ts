import type { StatusVisibility } from './mastodon.js';

/**
 * Configuration types for ical-to-masto
 */

/**
 * Shape of the JSON configuration file
 */
export interface ConfigFile {
  instance: string;
  webcal: string;
  tokenFile?: string;
  maxEvents?: number;
  floatingTimeZone?: string;
  displayTimeZone?: string;
  locale?: string;
  fetchTimeout?: number;
  visibility?: StatusVisibility;
  heading?: string;
  emptyMessage?: string;
}

/**
 * Configuration with defaults applied
 */
export interface AppConfig extends Required<Omit<ConfigFile, 'floatingTimeZone' | 'displayTimeZone'>> {
  floatingTimeZone?: string;
  displayTimeZone?: string;
}

export interface ConfigValidationError {
  field: string;
  message: string;
  value?: unknown;
}
