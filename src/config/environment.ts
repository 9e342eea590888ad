// Environment configuration for the printer driver

export interface EnvironmentConfig {
  NODE_ENV: string;
  DEBUG_LOGGING: boolean;
  /** Default text encoding used by new printer sessions */
  ESCPOS_ENCODING: string;
  /** Default device path used by DeviceFileSink */
  ESCPOS_DEVICE: string;
}

const DEFAULT_ENCODING = 'utf8';
const DEFAULT_DEVICE = '/dev/usb/lp0';

function readString(value: string | undefined, fallback: string): string {
  const trimmed = (value || '').trim();
  return trimmed || fallback;
}

export function loadEnvironment(env: NodeJS.ProcessEnv = process.env): EnvironmentConfig {
  return {
    NODE_ENV: readString(env.NODE_ENV, 'production'),
    DEBUG_LOGGING: env.DEBUG_LOGGING === 'true',
    ESCPOS_ENCODING: readString(env.ESCPOS_ENCODING, DEFAULT_ENCODING),
    ESCPOS_DEVICE: readString(env.ESCPOS_DEVICE, DEFAULT_DEVICE),
  };
}

export const environment: EnvironmentConfig = loadEnvironment();
