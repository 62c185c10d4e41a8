import {DEFAULT_DEVICE_NAME, DeviceState} from '../canvas/client.js';
import {MAX_IDLE, OptionAxis, SLEEP_DURATION, WAKE_SENSITIVITY} from '../canvas/options.js';
import {MAX_NAME_LENGTH, MIN_NAME_LENGTH} from '../canvas/settingsPayload.js';
import {ButtonCommand} from '../commandDispatcher.js';
import {DeviceContext} from './deviceContext.js';

type NumericSetting = 'sleep_duration' | 'max_idle' | 'idx_wake_sens';

export type SelectDescription = {
  key: string;
  name: string;
  axis: OptionAxis;
  setting: NumericSetting;
};

export type ButtonDescription = {
  key: string;
  name: string;
  command: ButtonCommand;
};

export const SELECTS: readonly SelectDescription[] = [
  {key: 'sleep_duration', name: 'Sleep Duration', axis: SLEEP_DURATION, setting: 'sleep_duration'},
  {key: 'max_idle', name: 'Max Idle Time', axis: MAX_IDLE, setting: 'max_idle'},
  {key: 'wake_sensitivity', name: 'Wake Sensitivity', axis: WAKE_SENSITIVITY, setting: 'idx_wake_sens'},
];

export const BUTTONS: readonly ButtonDescription[] = [
  {key: 'next_image', name: 'Next Image', command: 'show_next'},
  {key: 'reboot', name: 'Reboot', command: 'reboot'},
  {key: 'clear_screen', name: 'Clear Screen', command: 'clear_screen'},
  {key: 'whistle', name: 'Whistle', command: 'whistle'},
  {key: 'refresh', name: 'Refresh Info', command: 'refresh_device_info'},
];

export const DEVICE_NAME_TEXT = {
  key: 'device_name',
  name: 'Device Name',
  minLength: MIN_NAME_LENGTH,
  maxLength: MAX_NAME_LENGTH,
} as const;

export function currentOption(select: SelectDescription, state: DeviceState | null): string {
  return state ? select.axis.decode(state[select.setting]) : select.axis.defaultLabel;
}

export async function readOption(select: SelectDescription, context: DeviceContext): Promise<string> {
  return currentOption(select, await context.cache.get());
}

export function selectOption(select: SelectDescription, context: DeviceContext, label: string): Promise<boolean> {
  return context.dispatcher.selectOption(select.axis, label);
}

export function currentName(state: DeviceState | null): string {
  return state ? state.name : DEFAULT_DEVICE_NAME;
}

export async function readName(context: DeviceContext): Promise<string> {
  return currentName(await context.cache.get());
}

export function setName(context: DeviceContext, value: string): Promise<boolean> {
  return context.dispatcher.setName(value);
}

export function press(button: ButtonDescription, context: DeviceContext): Promise<boolean> {
  return context.dispatcher.press(button.command);
}
