import {DeviceState, SettingsPayload} from './client.js';

export const MIN_NAME_LENGTH = 1;
export const MAX_NAME_LENGTH = 50;

export type SettingsChange =
  | { field: 'name'; value: string }
  | { field: 'sleepDuration'; value: number }
  | { field: 'maxIdle'; value: number }
  | { field: 'wakeSensitivity'; value: number };

export function validateName(name: string): string {
  const trimmed = name.trim();
  if (trimmed.length < MIN_NAME_LENGTH || trimmed.length > MAX_NAME_LENGTH) {
    throw new RangeError(`device name must be ${MIN_NAME_LENGTH}-${MAX_NAME_LENGTH} characters, got ${trimmed.length}`);
  }
  return trimmed;
}

/**
 * Builds the complete settings write for a single changed field. The canvas replaces all four
 * settings on every update, so the untouched fields are carried over from the cached snapshot.
 */
export function buildUpdate(current: DeviceState, change: SettingsChange): SettingsPayload {
  const payload: SettingsPayload = {
    name: current.name,
    sleep_duration: current.sleep_duration,
    max_idle: current.max_idle,
    idx_wake_sens: current.idx_wake_sens,
  };
  switch (change.field) {
    case 'name':
      payload.name = validateName(change.value);
      break;
    case 'sleepDuration':
      payload.sleep_duration = change.value;
      break;
    case 'maxIdle':
      payload.max_idle = change.value;
      break;
    case 'wakeSensitivity':
      payload.idx_wake_sens = change.value;
      break;
  }
  return payload;
}
