import {Logger, PlatformConfig} from 'homebridge';
import {DEFAULT_DEVICE_NAME} from './canvas/client.js';

export type CanvasDeviceConfig = {
  host: string;
  name?: string;
};

export type PluginConfig = {
  platform: string;
  devices: CanvasDeviceConfig[];
  polling_interval_seconds?: number;
  request_timeout_seconds?: number;
  low_battery_threshold?: number;
  expose_settings?: boolean;
};

export type CanvasOptions = {
  pollingIntervalMs: number;
  requestTimeoutMs: number;
  lowBatteryThreshold: number;
  exposeSettings: boolean;
};

export const DEFAULT_POLLING_INTERVAL_SECONDS = 60;
export const MIN_POLLING_INTERVAL_SECONDS = 10;
export const DEFAULT_REQUEST_TIMEOUT_SECONDS = 10;
export const MIN_REQUEST_TIMEOUT_SECONDS = 1;
export const DEFAULT_LOW_BATTERY_THRESHOLD = 20;

export function isDeviceConfig(value: unknown): value is CanvasDeviceConfig {
  if (typeof value !== 'object' || value === null || !('host' in value)) {
    return false;
  }
  if (typeof value.host !== 'string' || value.host.trim() === '') {
    return false;
  }
  return !('name' in value) || value.name === undefined || typeof value.name === 'string';
}

export const validateConfig = (config: PlatformConfig): [boolean, string] => {
  const devices: unknown = config.devices;
  if (!Array.isArray(devices) || devices.length === 0) {
    return [false, 'No canvas devices configured - plugin will not start'];
  }

  if (!devices.every(isDeviceConfig)) {
    return [false, 'Every device needs a host - plugin will not start'];
  }

  const hosts = devices.map(device => normalizeHost(device.host));
  const duplicate = hosts.find((host, index) => hosts.indexOf(host) !== index);
  if (duplicate) {
    return [false, `Device ${duplicate} is configured more than once`];
  }

  return [true, ''];
};

export function configuredDevices(config: PlatformConfig): CanvasDeviceConfig[] {
  const devices: unknown = config.devices;
  return Array.isArray(devices) ? devices.filter(isDeviceConfig) : [];
}

/**
 * Accepts `192.168.1.5`, `192.168.1.5:8080` or `http://192.168.1.5/` and returns a base URL.
 */
export function normalizeHost(host: string): string {
  const trimmed = host.trim().replace(/\/+$/, '');
  return /^https?:\/\//i.test(trimmed) ? trimmed : `http://${trimmed}`;
}

export function deviceName(device: CanvasDeviceConfig): string {
  return device.name?.trim() || DEFAULT_DEVICE_NAME;
}

function numberOption(config: PlatformConfig, key: keyof PluginConfig): number | undefined {
  const value: unknown = config[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

export function resolveOptions(config: PlatformConfig, log: Logger): CanvasOptions {
  let pollingSeconds = numberOption(config, 'polling_interval_seconds') ?? DEFAULT_POLLING_INTERVAL_SECONDS;
  if (pollingSeconds < MIN_POLLING_INTERVAL_SECONDS) {
    log.warn(`Polling interval must be at least ${MIN_POLLING_INTERVAL_SECONDS} seconds. Using ${MIN_POLLING_INTERVAL_SECONDS} seconds.`);
    pollingSeconds = MIN_POLLING_INTERVAL_SECONDS;
  }

  let timeoutSeconds = numberOption(config, 'request_timeout_seconds') ?? DEFAULT_REQUEST_TIMEOUT_SECONDS;
  if (timeoutSeconds < MIN_REQUEST_TIMEOUT_SECONDS) {
    log.warn(`Request timeout must be at least ${MIN_REQUEST_TIMEOUT_SECONDS} second. Using ${MIN_REQUEST_TIMEOUT_SECONDS} second.`);
    timeoutSeconds = MIN_REQUEST_TIMEOUT_SECONDS;
  }

  const threshold = numberOption(config, 'low_battery_threshold') ?? DEFAULT_LOW_BATTERY_THRESHOLD;
  const lowBatteryThreshold = Math.min(100, Math.max(0, threshold));
  if (lowBatteryThreshold !== threshold) {
    log.warn(`Low battery threshold must be between 0 and 100. Using ${lowBatteryThreshold}.`);
  }

  return {
    pollingIntervalMs: pollingSeconds * 1000,
    requestTimeoutMs: timeoutSeconds * 1000,
    lowBatteryThreshold,
    exposeSettings: config.expose_settings !== false,
  };
}
