import {Client, DeviceState} from './canvas/client.js';

export type LogLevel = 'info' | 'warning' | 'error';

export type LogEntry = {
  readonly timestamp: Date;
  readonly level: LogLevel;
  readonly message: string;
};

export const MAX_LOG_ENTRIES = 100;

/**
 * Shared state for one configured canvas: the last fetched snapshot, the API client and the
 * device log history. Every service of the accessory reads through the same instance.
 */
export class RuntimeData {
  private deviceInfo: DeviceState | null = null;
  private readonly entries: LogEntry[] = [];

  constructor(
    readonly host: string,
    readonly client: Client,
    private readonly logLimit = MAX_LOG_ENTRIES,
  ) {
  }

  get(): DeviceState | null {
    return this.deviceInfo;
  }

  // snapshots are replaced whole, never patched
  set(state: DeviceState): void {
    this.deviceInfo = Object.isFrozen(state) ? state : Object.freeze({...state});
  }

  clear(): void {
    this.deviceInfo = null;
  }

  appendLog(level: LogLevel, message: string, timestamp = new Date()): LogEntry {
    const entry: LogEntry = Object.freeze({timestamp, level, message});
    this.entries.push(entry);
    if (this.entries.length > this.logLimit) {
      this.entries.splice(0, this.entries.length - this.logLimit);
    }
    return entry;
  }

  get logs(): LogEntry[] {
    return [...this.entries];
  }

  dispose(): void {
    this.clear();
  }
}
