import {LogEntry} from '../runtimeData.js';

const KB = 1024;
const MB = KB * 1024;
const GB = MB * 1024;

export type StorageStatus = 'healthy' | 'warning' | 'critical';

export type StorageUsage = {
  usagePercent: number;
  usedBytes: number;
  totalBytes: number;
  freeBytes: number;
  usedFormatted: string;
  totalFormatted: string;
  freeFormatted: string;
  status: StorageStatus;
  summary: string;
};

function round(value: number, digits: number): number {
  const factor = Math.pow(10, digits);
  return Math.round(value * factor) / factor;
}

// whole numbers keep one decimal: `1.0`, not `1`
function decimal(value: number): string {
  return Number.isInteger(value) ? value.toFixed(1) : String(value);
}

export function formatBytes(bytes: number): string {
  if (bytes >= GB) {
    return `${decimal(round(bytes / GB, 2))} GB`;
  }
  if (bytes >= MB) {
    return `${decimal(round(bytes / MB, 1))} MB`;
  }
  if (bytes >= KB) {
    return `${decimal(round(bytes / KB, 1))} KB`;
  }
  return `${bytes} B`;
}

export function storageStatus(usagePercent: number): StorageStatus {
  if (usagePercent < 90) {
    return 'healthy';
  }
  return usagePercent < 95 ? 'warning' : 'critical';
}

/**
 * Summarises storage as `85.7% (1.12 GB / 1.3 GB)`. Returns null when the device reports no
 * capacity, since a percentage of zero is meaningless.
 */
export function storageUsage(totalBytes: number, freeBytes: number): StorageUsage | null {
  if (totalBytes <= 0) {
    return null;
  }
  const usedBytes = totalBytes - freeBytes;
  const usagePercent = round((usedBytes / totalBytes) * 100, 1);
  const usedFormatted = formatBytes(usedBytes);
  const totalFormatted = formatBytes(totalBytes);
  return {
    usagePercent,
    usedBytes,
    totalBytes,
    freeBytes,
    usedFormatted,
    totalFormatted,
    freeFormatted: formatBytes(freeBytes),
    status: storageStatus(usagePercent),
    summary: `${decimal(usagePercent)}% (${usedFormatted} / ${totalFormatted})`,
  };
}

const canvasModels: ReadonlyArray<readonly [width: number, height: number, model: string]> = [
  [480, 800, '7.3" Canvas'],
  [1200, 1600, '13.3" Canvas'],
  [2160, 3060, '28.5" Canvas'],
];

export function canvasModel(width: number, height: number): string {
  const match = canvasModels.find(([w, h]) => w === width && h === height);
  return match ? match[2] : 'Unknown';
}

export function imageName(imagePath: string): string {
  const segments = imagePath.split('/');
  return segments[segments.length - 1];
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

export function formatLogEntry(entry: LogEntry): string {
  const {timestamp} = entry;
  const time = `${pad(timestamp.getHours())}:${pad(timestamp.getMinutes())}:${pad(timestamp.getSeconds())}`;
  return `[${time}] ${entry.level.toUpperCase()}: ${entry.message}`;
}
