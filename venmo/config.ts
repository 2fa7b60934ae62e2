import { format } from 'date-fns';

import { ConfigError } from './errors.js';

export interface ConverterConfig {
  /** Quicken account every record is filed under. */
  account: string;
  /** date-fns pattern for the Date column. */
  dateFormat: string;
}

export const DEFAULT_CONFIG: Readonly<ConverterConfig> = {
  account: 'Venmo',
  dateFormat: 'MM/dd/yyyy',
};

export const ENV_ACCOUNT = 'VENMO_QUICKEN_ACCOUNT';
export const ENV_DATE_FORMAT = 'VENMO_QUICKEN_DATE_FORMAT';

export interface ConfigFlags {
  account?: string;
  dateFormat?: string;
}

type Env = Record<string, string | undefined>;

function firstNonBlank(...values: Array<string | undefined>): string | undefined {
  return values.find((value): value is string => value !== undefined && value.trim() !== '');
}

export function validateDateFormat(pattern: string): void {
  if (!pattern.trim()) {
    throw new ConfigError('Date format must not be empty');
  }
  try {
    format(new Date(2000, 0, 1), pattern);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Invalid date format "${pattern}": ${reason}`);
  }
}

/**
 * Flags win over environment variables, which win over the defaults.
 */
export function resolveConfig(flags: ConfigFlags = {}, env: Env = {}): ConverterConfig {
  const config: ConverterConfig = {
    account: firstNonBlank(flags.account, env[ENV_ACCOUNT]) ?? DEFAULT_CONFIG.account,
    dateFormat: firstNonBlank(flags.dateFormat, env[ENV_DATE_FORMAT]) ?? DEFAULT_CONFIG.dateFormat,
  };
  validateDateFormat(config.dateFormat);
  return config;
}
