import {DeviceState} from '../canvas/client.js';
import {DeviceContext} from './deviceContext.js';
import {canvasModel, formatLogEntry, imageName, storageUsage} from './formatters.js';

export type AttributeValue = string | number | boolean | null | string[];

export type SensorReading = {
  value: string | number | null;
  attributes: Record<string, AttributeValue>;
};

export type SensorDescription = {
  key: string;
  name: string;
  diagnostic: boolean;
  render: (state: DeviceState | null, context: DeviceContext) => SensorReading;
};

export const RECENT_LOG_COUNT = 10;

const reading = (value: string | number | null): SensorReading => ({value, attributes: {}});

export const deviceInfoSensor: SensorDescription = {
  key: 'device_info',
  name: 'Device Info',
  diagnostic: true,
  render: state => {
    if (!state) {
      return reading('Offline');
    }
    return {
      value: 'Online',
      attributes: {
        device_name: state.name,
        firmware_version: state.version,
        board_model: state.board_model,
        screen_model: state.screen_model,
        network_type: state.network_type,
        wifi_ssid: state.sta_ssid,
        ip_address: state.sta_ip,
        resolution: `${state.width}x${state.height}`,
        screen_width: state.width,
        screen_height: state.height,
        sleep_duration: state.sleep_duration,
        max_idle: state.max_idle,
        gallery: state.gallery,
        playlist: state.playlist,
        play_type: state.play_type,
      },
    };
  },
};

export const batterySensor: SensorDescription = {
  key: 'battery',
  name: 'Battery',
  diagnostic: false,
  render: state => reading(state ? state.battery : null),
};

export const storageSensor: SensorDescription = {
  key: 'storage',
  name: 'Storage',
  diagnostic: false,
  render: state => {
    if (!state) {
      return reading('Offline');
    }
    const usage = storageUsage(state.total_size, state.free_size);
    if (!usage) {
      return reading('Unknown');
    }
    return {
      value: usage.summary,
      attributes: {
        usage_percentage: usage.usagePercent,
        used_size_bytes: usage.usedBytes,
        total_size_bytes: usage.totalBytes,
        free_size_bytes: usage.freeBytes,
        used_formatted: usage.usedFormatted,
        total_formatted: usage.totalFormatted,
        free_formatted: usage.freeFormatted,
        fs_ready: state.fs_ready,
        storage_status: usage.status,
      },
    };
  },
};

export const currentImageSensor: SensorDescription = {
  key: 'current_image',
  name: 'Current Image',
  diagnostic: false,
  render: (state, context) => {
    if (!state || !state.image) {
      return reading('None');
    }
    return {
      value: imageName(state.image),
      attributes: {
        full_path: state.image,
        image_url: `${context.cache.client.baseURL}${state.image}`,
        next_time: state.next_time,
      },
    };
  },
};

// reads the log history, not the device snapshot
export const logSensor: SensorDescription = {
  key: 'logs',
  name: 'Logs',
  diagnostic: true,
  render: (_state, context) => {
    const logs = context.cache.runtime.logs;
    if (logs.length === 0) {
      return reading('No logs');
    }
    const latest = logs[logs.length - 1];
    return {
      value: latest.message,
      attributes: {
        latest_level: latest.level,
        latest_timestamp: latest.timestamp.toISOString(),
        total_logs: logs.length,
        recent_logs: logs.slice(-RECENT_LOG_COUNT).map(formatLogEntry),
      },
    };
  },
};

export const firmwareVersionSensor: SensorDescription = {
  key: 'firmware_version',
  name: 'Firmware Version',
  diagnostic: true,
  render: state => reading(state ? state.version || 'Unknown' : 'Offline'),
};

export const wifiSsidSensor: SensorDescription = {
  key: 'wifi_ssid',
  name: 'WiFi SSID',
  diagnostic: true,
  render: state => {
    if (!state) {
      return reading('Offline');
    }
    return {
      value: state.sta_ssid || 'Unknown',
      attributes: {
        ip_address: state.sta_ip,
        network_type: state.network_type,
      },
    };
  },
};

export const screenResolutionSensor: SensorDescription = {
  key: 'screen_resolution',
  name: 'Screen Resolution',
  diagnostic: true,
  render: state => {
    if (!state) {
      return reading('Unknown');
    }
    const {width, height} = state;
    return {
      value: `${width}x${height}`,
      attributes: {
        width,
        height,
        canvas_model: canvasModel(width, height),
        screen_model: state.screen_model || 'Unknown',
        aspect_ratio: `${width}:${height}`,
      },
    };
  },
};

export const SENSORS: readonly SensorDescription[] = [
  deviceInfoSensor,
  batterySensor,
  storageSensor,
  currentImageSensor,
  logSensor,
  firmwareVersionSensor,
  wifiSsidSensor,
  screenResolutionSensor,
];

/**
 * Reads one sensor through the shared cache. Only an empty cache causes a device request.
 */
export async function readSensor(sensor: SensorDescription, context: DeviceContext): Promise<SensorReading> {
  const state = sensor === logSensor ? context.cache.runtime.get() : await context.cache.get();
  return sensor.render(state, context);
}
