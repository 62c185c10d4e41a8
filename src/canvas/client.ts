// filename: src/canvas/client.ts
import axios, {AxiosInstance, AxiosResponse} from 'axios';
import {Logger} from 'homebridge';

export const DEFAULT_DEVICE_NAME = 'E-Ink Canvas';
export const DEFAULT_TIMEOUT_MS = 10 * 1000;

export type DeviceCommand = 'show_next' | 'reboot' | 'clear_screen' | 'whistle' | 'sleep';

const commandEndpoints: Record<DeviceCommand, { method: 'GET' | 'POST'; endpoint: string }> = {
  show_next: {method: 'POST', endpoint: '/showNext'},
  reboot: {method: 'POST', endpoint: '/reboot'},
  clear_screen: {method: 'POST', endpoint: '/clearScreen'},
  whistle: {method: 'GET', endpoint: '/whistle'},
  sleep: {method: 'POST', endpoint: '/sleep'},
};

export class Client {
  readonly baseURL: string;
  private readonly axiosClient: AxiosInstance;
  private readonly log?: Logger;

  constructor(baseURL: string, log?: Logger, timeoutMs = DEFAULT_TIMEOUT_MS) {
    this.baseURL = baseURL;
    this.axiosClient = axios.create({baseURL: baseURL, timeout: timeoutMs});
    this.log = log;
  }

  private logResponse<T>(response: AxiosResponse<T>, method: string, endpoint: string): void {
    if (this.log) {
      this.log.debug(`API ${method} ${endpoint} - Response Code: ${response.status}`);
    }
  }

  private logError(error: unknown, method: string, endpoint: string): void {
    if (!this.log) {
      return;
    }
    if (axios.isAxiosError(error)) {
      const status = error.response?.status;
      if (status === undefined) {
        if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
          this.log.error(`API ${method} ${endpoint} - request timed out`);
        } else {
          this.log.error(`API ${method} ${endpoint} - no response from device (${error.code ?? error.message})`);
        }
        return;
      }
      if (status === 429) {
        this.log.error(`API ${method} ${endpoint} - RATE LIMITED (429): Too many requests. Consider increasing your polling interval.`);
      } else {
        this.log.error(`API ${method} ${endpoint} - Error ${status}: ${error.response?.statusText || 'Unknown error'}`);
      }
      if (error.response?.data) {
        const data = typeof error.response.data === 'object'
          ? JSON.stringify(error.response.data)
          : String(error.response.data);
        this.log.debug(`API error details: ${data}`);
      }
      return;
    }
    const errorMessage = error instanceof Error ? error.message : String(error);
    this.log.error(`API ${method} ${endpoint} - Unexpected error: ${errorMessage}`);
  }

  /**
   * Fetches the device's current state. Resolves to null when the canvas cannot be reached
   * or answers with anything other than a JSON object.
   */
  async getDeviceInfo(): Promise<DeviceState | null> {
    const endpoint = '/deviceInfo';
    try {
      const response = await this.axiosClient.get<DeviceInfoResponse>(endpoint);
      this.logResponse(response, 'GET', endpoint);
      if (typeof response.data !== 'object' || response.data === null) {
        this.log?.error(`API GET ${endpoint} - response was not a JSON object`);
        return null;
      }
      return toDeviceState(response.data);
    } catch (error) {
      this.logError(error, 'GET', endpoint);
      return null;
    }
  }

  async sendCommand(command: DeviceCommand): Promise<boolean> {
    const {method, endpoint} = commandEndpoints[command];
    try {
      const response = method === 'GET'
        ? await this.axiosClient.get<unknown>(endpoint)
        : await this.axiosClient.post<unknown>(endpoint);
      this.logResponse(response, method, endpoint);
      return true;
    } catch (error) {
      this.logError(error, method, endpoint);
      return false;
    }
  }

  /**
   * The device overwrites every settings field on each call, so the payload must always be complete.
   */
  async updateSettings(payload: SettingsPayload): Promise<boolean> {
    const endpoint = '/settings';
    try {
      const response = await this.axiosClient.post<unknown>(endpoint, payload);
      this.logResponse(response, 'POST', endpoint);
      return true;
    } catch (error) {
      this.logError(error, 'POST', endpoint);
      return false;
    }
  }
}

export function toDeviceState(raw: DeviceInfoResponse): DeviceState {
  return Object.freeze({
    name: raw.name ?? DEFAULT_DEVICE_NAME,
    version: raw.version ?? '',
    board_model: raw.board_model ?? '',
    screen_model: raw.screen_model ?? '',
    network_type: raw.network_type ?? '',
    sta_ssid: raw.sta_ssid ?? '',
    sta_ip: raw.sta_ip ?? '',
    width: raw.width ?? 0,
    height: raw.height ?? 0,
    battery: raw.battery ?? 0,
    total_size: raw.total_size ?? 0,
    free_size: raw.free_size ?? 0,
    sleep_duration: raw.sleep_duration ?? 86400,
    max_idle: raw.max_idle ?? 300,
    idx_wake_sens: raw.idx_wake_sens ?? 3,
    image: raw.image ?? '',
    next_time: raw.next_time ?? '',
    gallery: raw.gallery ?? '',
    playlist: raw.playlist ?? '',
    play_type: raw.play_type ?? '',
    fs_ready: raw.fs_ready ?? false,
  });
}

export type DeviceState = {
  readonly name: string;
  readonly version: string;
  readonly board_model: string;
  readonly screen_model: string;
  readonly network_type: string;
  readonly sta_ssid: string;
  readonly sta_ip: string;
  readonly width: number;
  readonly height: number;
  readonly battery: number;
  readonly total_size: number;
  readonly free_size: number;
  readonly sleep_duration: number;
  readonly max_idle: number;
  readonly idx_wake_sens: number;
  readonly image: string;
  readonly next_time: string | number;
  readonly gallery: string;
  readonly playlist: string;
  readonly play_type: string | number;
  readonly fs_ready: boolean;
};

export type DeviceInfoResponse = Partial<DeviceState>;

export type SettingsPayload = {
  name: string;
  sleep_duration: number;
  max_idle: number;
  idx_wake_sens: number;
};
