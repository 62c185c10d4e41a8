import {
  API,
  DynamicPlatformPlugin,
  Logging,
  PlatformAccessory,
  Service,
  Characteristic,
  PlatformConfig,
} from 'homebridge';

import {Client} from './canvas/client.js';
import {
  CanvasDeviceConfig,
  CanvasOptions,
  configuredDevices,
  deviceName,
  normalizeHost,
  resolveOptions,
  validateConfig,
} from './config.js';
import {CommandDispatcher} from './commandDispatcher.js';
import ReadThroughCache from './readThroughCache.js';
import {RuntimeData} from './runtimeData.js';
import {PLATFORM_NAME, PLUGIN_NAME} from './settings.js';
import {CanvasContext, CanvasPlatformAccessory} from './platformAccessory.js';

// When this event is fired it means Homebridge has restored all cached accessories from disk.
// Dynamic Platform plugins should only register new accessories after this event was fired,
// in order to ensure they weren't added to homebridge already. This event can also be used
// to start discovery of new accessories.
const didFinishLaunching = 'didFinishLaunching';
const shutdown = 'shutdown';

export class CanvasPlatform implements DynamicPlatformPlugin {
  public readonly Service: typeof Service;
  public readonly Characteristic: typeof Characteristic;

  // this is used to track restored cached accessories
  public readonly accessories: PlatformAccessory[] = [];

  // one runtime per configured canvas, keyed by normalised host
  public readonly runtimes = new Map<string, RuntimeData>();
  private readonly handlers = new Map<string, CanvasPlatformAccessory>();
  private readonly options: CanvasOptions;

  constructor(
    public readonly log: Logging,
    public readonly config: PlatformConfig,
    public readonly api: API,
  ) {
    this.Service = api.hap.Service;
    this.Characteristic = api.hap.Characteristic;
    this.options = resolveOptions(config, log);

    const [validConfig, message] = validateConfig(this.config);
    if (!validConfig) {
      this.log.error(message);
      return;
    }

    this.log.debug('Finished initializing platform:', config.platform);
    this.api.on(didFinishLaunching, () => {
      log.debug('Executed didFinishLaunching callback');
      this.discoverDevices().catch(err => {
        this.log.error(`error during device discovery (${err})`);
      });
    });
    this.api.on(shutdown, () => this.shutdown());
  }

  /**
   * This function is invoked when homebridge restores cached accessories from disk at startup.
   * It should be used to set up event handlers for characteristics and update respective values.
   */
  configureAccessory(accessory: PlatformAccessory) {
    this.log.info('Loading accessory from cache:', accessory.displayName);

    // add the restored accessory to the accessories cache, so we can track if it has already been registered
    this.accessories.push(accessory);
  }

  /**
   * Sets up every configured canvas and drops cached accessories whose canvas is no longer
   * configured.
   */
  async discoverDevices(): Promise<void> {
    const devices = configuredDevices(this.config);
    const uuids = devices.map(device => this.api.hap.uuid.generate(normalizeHost(device.host)));
    await Promise.all(devices.map(device => this.setUpDevice(device).catch(err => {
      this.log.error(`Unexpected error while setting up ${device.host}: ${err instanceof Error ? err.message : String(err)}`);
    })));

    const stale = this.accessories.filter(accessory => !uuids.includes(accessory.UUID));
    if (stale.length > 0) {
      stale.forEach(accessory => this.log.info('Removing existing accessory from cache:', accessory.displayName));
      this.api.unregisterPlatformAccessories(PLUGIN_NAME, PLATFORM_NAME, stale);
      stale.forEach(accessory => this.accessories.splice(this.accessories.indexOf(accessory), 1));
    }
  }

  private async setUpDevice(device: CanvasDeviceConfig): Promise<void> {
    const host = normalizeHost(device.host);
    const name = deviceName(device);
    const uuid = this.api.hap.uuid.generate(host);
    const existingAccessory = this.accessories.find(accessory => accessory.UUID === uuid);

    const runtime = new RuntimeData(host, new Client(host, this.log, this.options.requestTimeoutMs));
    const cache = new ReadThroughCache(runtime, this.log);
    this.log.info(`Attempting to connect to canvas at: ${host}`);
    const state = await cache.refresh();
    if (state) {
      this.log.info(`Successfully connected to canvas at ${host}`);
    } else if (!existingAccessory) {
      this.log.error(`Failed to connect to canvas at ${host} - no response from /deviceInfo endpoint. Restart Homebridge once the canvas is reachable`);
      return;
    } else {
      this.log.warn(`Canvas at ${host} is not responding, will keep polling`);
    }

    this.runtimes.set(host, runtime);
    const context = {host, displayName: name, cache, dispatcher: new CommandDispatcher(cache, this.log)};

    if (existingAccessory) {
      this.log.info('Restoring existing accessory from cache:', existingAccessory.displayName);
      this.handlers.set(host, new CanvasPlatformAccessory(this, existingAccessory, context, this.options));
      return;
    }

    this.log.info('Adding new accessory:', name);
    const accessory = new this.api.platformAccessory(name, uuid);
    accessory.context.canvas = {host, name} satisfies CanvasContext;
    this.handlers.set(host, new CanvasPlatformAccessory(this, accessory, context, this.options));
    this.api.registerPlatformAccessories(PLUGIN_NAME, PLATFORM_NAME, [accessory]);
    this.accessories.push(accessory);
  }

  shutdown(): void {
    this.handlers.forEach(handler => handler.stop());
    this.handlers.clear();
    this.runtimes.forEach(runtime => runtime.dispose());
    this.runtimes.clear();
  }
}
