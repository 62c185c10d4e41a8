import {Client, DeviceState} from './canvas/client.js';
import {Logger} from 'homebridge';
import {RuntimeData} from './runtimeData.js';

type InFlight = {
  generation: number;
  promise: Promise<DeviceState | null>;
};

/**
 * Single place that decides when the canvas is polled. A cached snapshot is trusted until the
 * poll timer replaces it; only an empty cache triggers a fetch from a read.
 *
 * Every settings write bumps the generation. Requests started before the bump are never joined
 * by later callers, and their answers are not stored.
 */
class ReadThroughCache {
  private request?: InFlight;
  private generation = 0;
  private offline = false;

  constructor(readonly runtime: RuntimeData, private readonly log: Logger) {
  }

  get client(): Client {
    return this.runtime.client;
  }

  get(): Promise<DeviceState | null> {
    const cached = this.runtime.get();
    if (cached) {
      this.log.debug(`returning cached device info for ${this.runtime.host}`);
      return Promise.resolve(cached);
    }
    return this.fetch();
  }

  refresh(): Promise<DeviceState | null> {
    return this.fetch();
  }

  // called once the canvas has accepted a settings write
  invalidate(): void {
    this.generation += 1;
  }

  private current(): InFlight | undefined {
    return this.request?.generation === this.generation ? this.request : undefined;
  }

  private fetch(): Promise<DeviceState | null> {
    const current = this.current();
    if (current) {
      this.log.debug('returning current in-flight request');
      return current.promise;
    }
    this.log.debug(`requesting device info from ${this.runtime.host}`);
    const request: InFlight = {
      generation: this.generation,
      promise: this.load(this.generation).finally(() => {
        if (this.request === request) {
          this.request = undefined;
        }
      }),
    };
    this.request = request;
    return request.promise;
  }

  private async load(generation: number): Promise<DeviceState | null> {
    const state = await this.runtime.client.getDeviceInfo();
    if (generation !== this.generation) {
      this.log.debug(`dropping device info from ${this.runtime.host} requested before a settings write`);
      const current = this.current();
      return current ? current.promise : this.runtime.get();
    }
    if (!state) {
      // a known failure must read as offline, not as the previous snapshot
      this.runtime.clear();
      if (!this.offline) {
        this.offline = true;
        this.log.warn(`${this.runtime.host} did not return device info`);
        this.runtime.appendLog('warning', 'Failed to get device info');
      }
      return null;
    }
    this.runtime.set(state);
    if (this.offline) {
      this.offline = false;
      this.log.info(`${this.runtime.host} is back online`);
      this.runtime.appendLog('info', 'Device back online');
    }
    return state;
  }
}

export default ReadThroughCache;
