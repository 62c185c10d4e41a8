// filename: src/platformAccessory.ts
import {CharacteristicValue, PlatformAccessory, Service} from 'homebridge';

import {CanvasPlatform} from './platform.js';
import {DeviceState} from './canvas/client.js';
import {CanvasOptions} from './config.js';
import {DeviceContext} from './presentation/deviceContext.js';
import {canvasModel} from './presentation/formatters.js';
import {SENSORS} from './presentation/sensors.js';
import {currentName, readName, setName} from './presentation/controls.js';
import {createBatteryService} from './battery/service.js';
import {createButtonServices} from './controls/buttonService.js';
import {createOptionSwitches} from './controls/optionSwitches.js';

export type CanvasContext = {
  host: string;
  name: string;
};

type Publisher = (state: DeviceState | null) => void;

export class CanvasPlatformAccessory {
  private timeout: NodeJS.Timeout | undefined;
  private readonly publishers: Publisher[] = [];
  private stopped = false;

  constructor(
    readonly platform: CanvasPlatform,
    readonly accessory: PlatformAccessory,
    readonly context: DeviceContext,
    private readonly options: CanvasOptions,
  ) {
    const {Characteristic, Service} = this.platform;
    this.platform.log.debug(`Initializing ${this.accessory.displayName} (${context.host})`);
    this.platform.log.debug(`Polling interval: ${options.pollingIntervalMs / 1000} seconds`);

    const information = this.accessory.getService(Service.AccessoryInformation) ||
      this.accessory.addService(Service.AccessoryInformation);
    information
      .setCharacteristic(Characteristic.Manufacturer, 'BLOOMIN8')
      .setCharacteristic(Characteristic.Model, 'E-Ink Canvas')
      .setCharacteristic(Characteristic.SerialNumber, context.host);
    information.getCharacteristic(Characteristic.ConfiguredName)
      .onGet(() => readName(this.context))
      .onSet(value => this.rename(value));

    const battery = createBatteryService(this, options.lowBatteryThreshold);
    const kept: Service[] = [information, battery.service, ...createButtonServices(this)];
    this.publishers.push(battery.publish);
    if (options.exposeSettings) {
      const optionSwitches = createOptionSwitches(this);
      kept.push(...optionSwitches.services);
      this.publishers.push(optionSwitches.publish);
    }
    this.publishers.push(state => this.publishInformation(information, state));

    // services from an earlier configuration that are no longer offered
    this.accessory.services
      .filter(service => !kept.includes(service))
      .forEach(service => {
        this.platform.log.debug(`Removing stale service ${service.displayName}`);
        this.accessory.removeService(service);
      });

    this.publishUpdates(this.context.cache.runtime.get());
    this.scheduleNextCheck();
  }

  stop(): void {
    this.stopped = true;
    clearTimeout(this.timeout);
    this.timeout = undefined;
  }

  private async rename(value: CharacteristicValue): Promise<void> {
    const {HapStatusError, HAPStatus} = this.platform.api.hap;
    let ok = false;
    try {
      ok = await setName(this.context, String(value));
    } catch (err) {
      this.platform.log.error(`${this.accessory.displayName}: ${err instanceof Error ? err.message : String(err)}`);
    }
    if (!ok) {
      throw new HapStatusError(HAPStatus.SERVICE_COMMUNICATION_FAILURE);
    }
  }

  private scheduleNextCheck() {
    if (this.stopped) {
      return;
    }
    clearTimeout(this.timeout);
    this.timeout = setTimeout(() => {
      this.poll().catch(error => {
        this.platform.log.error(`${this.accessory.displayName}: Error polling device: ${error instanceof Error ? error.message : String(error)}`);
      }).finally(() => this.scheduleNextCheck());
    }, this.options.pollingIntervalMs);
    this.timeout.unref();
  }

  async poll(): Promise<void> {
    this.platform.log.debug(`${this.accessory.displayName}: Polling at: ${new Date()}`);
    const state = await this.context.cache.refresh();
    this.publishUpdates(state);
  }

  private publishInformation(information: Service, state: DeviceState | null) {
    if (!state) {
      return;
    }
    const {Characteristic} = this.platform;
    information.updateCharacteristic(Characteristic.Model, canvasModel(state.width, state.height));
    information.updateCharacteristic(Characteristic.ConfiguredName, currentName(state));
    if (state.version) {
      information.updateCharacteristic(Characteristic.FirmwareRevision, state.version);
    }
  }

  // Publishes all characteristic updates to HomeKit
  publishUpdates(state: DeviceState | null): void {
    this.publishers.forEach(publish => publish(state));
    SENSORS.forEach(sensor => {
      const reading = sensor.render(state, this.context);
      this.platform.log.debug(`${this.accessory.displayName} ${sensor.name}: ${reading.value ?? 'unknown'}`);
    });
  }
}
