import {Logger} from 'homebridge';
import {DeviceCommand} from './canvas/client.js';
import {OptionAxis, SLEEP_DURATION, MAX_IDLE, WAKE_SENSITIVITY} from './canvas/options.js';
import {buildUpdate, SettingsChange} from './canvas/settingsPayload.js';
import ReadThroughCache from './readThroughCache.js';

export type ButtonCommand = Exclude<DeviceCommand, 'sleep'> | 'refresh_device_info';

export type DispatchState = 'idle' | 'dispatching';

export class DeviceInfoUnavailableError extends Error {
  constructor(action: string) {
    super(`Cannot ${action}: device info not available`);
    this.name = 'DeviceInfoUnavailableError';
  }
}

const commandDescriptions: Record<ButtonCommand, string> = {
  show_next: 'show next image',
  reboot: 'reboot',
  clear_screen: 'clear screen',
  whistle: 'whistle',
  refresh_device_info: 'refresh device info',
};

const axisFields = new Map<OptionAxis, Exclude<SettingsChange['field'], 'name'>>([
  [SLEEP_DURATION, 'sleepDuration'],
  [MAX_IDLE, 'maxIdle'],
  [WAKE_SENSITIVITY, 'wakeSensitivity'],
]);

/**
 * Turns user actions into device calls. Each call blocks until the canvas answers or the request
 * times out; failures are recorded and reported, never retried.
 */
export class CommandDispatcher {
  private inFlight = 0;

  constructor(private readonly cache: ReadThroughCache, private readonly log: Logger) {
  }

  get state(): DispatchState {
    return this.inFlight > 0 ? 'dispatching' : 'idle';
  }

  press(command: ButtonCommand): Promise<boolean> {
    const description = commandDescriptions[command];
    return this.dispatch(description, async () => {
      if (command === 'refresh_device_info') {
        return (await this.cache.refresh()) !== null;
      }
      return this.cache.client.sendCommand(command);
    });
  }

  async selectOption(axis: OptionAxis, label: string): Promise<boolean> {
    const field = axisFields.get(axis);
    if (!field) {
      throw new Error(`${axis.name} is not a settings axis`);
    }
    let value: number;
    try {
      value = axis.encode(label);
    } catch (err) {
      this.log.error(err instanceof Error ? err.message : String(err));
      throw err;
    }
    return this.applySetting({field, value});
  }

  setName(name: string): Promise<boolean> {
    return this.applySetting({field: 'name', value: name});
  }

  /**
   * Writes one setting. The other three are taken from the cached snapshot; with nothing cached
   * the action is refused rather than sending defaults the canvas would store.
   */
  async applySetting(change: SettingsChange): Promise<boolean> {
    const description = `update ${describeField(change.field)}`;
    const current = this.cache.runtime.get();
    if (!current) {
      const err = new DeviceInfoUnavailableError(description);
      this.log.error(err.message);
      this.cache.runtime.appendLog('error', err.message);
      throw err;
    }
    const payload = buildUpdate(current, change);
    return this.dispatch(description, async () => {
      this.log.debug(`settings payload for ${this.cache.runtime.host}: ${JSON.stringify(payload)}`);
      const ok = await this.cache.client.updateSettings(payload);
      if (ok) {
        this.cache.invalidate();
        await this.cache.refresh();
      }
      return ok;
    });
  }

  private async dispatch(description: string, operation: () => Promise<boolean>): Promise<boolean> {
    const {host} = this.cache.runtime;
    this.inFlight += 1;
    this.log.info(`${host}: ${description}`);
    try {
      const ok = await operation();
      if (ok) {
        this.cache.runtime.appendLog('info', `${capitalize(description)} succeeded`);
      } else {
        this.log.error(`${host}: failed to ${description}`);
        this.cache.runtime.appendLog('error', `Failed to ${description}`);
      }
      return ok;
    } finally {
      this.inFlight -= 1;
    }
  }
}

function describeField(field: SettingsChange['field']): string {
  switch (field) {
    case 'name':
      return 'device name';
    case 'sleepDuration':
      return 'sleep duration';
    case 'maxIdle':
      return 'max idle time';
    case 'wakeSensitivity':
      return 'wake sensitivity';
  }
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}
