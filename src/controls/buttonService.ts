import {CharacteristicValue, Service} from 'homebridge';
import {CanvasPlatformAccessory} from '../platformAccessory.js';
import {BUTTONS, press} from '../presentation/controls.js';

// momentary switches flip back off after this long
export const BUTTON_RESET_MS = 1000;

export function createButtonServices(platformAccessory: CanvasPlatformAccessory): Service[] {
  const {platform, accessory, context} = platformAccessory;
  const {On} = platform.Characteristic;
  const {HapStatusError, HAPStatus} = platform.api.hap;

  return BUTTONS.map(button => {
    const service = accessory.getServiceById(platform.Service.Switch, button.key) ||
      accessory.addService(platform.Service.Switch, `${accessory.displayName} ${button.name}`, button.key);

    service.getCharacteristic(On)
      .onGet(() => false)
      .onSet(async (value: CharacteristicValue) => {
        if (value !== true) {
          return;
        }
        platform.log.info(`${accessory.displayName}: ${button.name} pressed`);
        const reset = setTimeout(() => service.updateCharacteristic(On, false), BUTTON_RESET_MS);
        reset.unref();
        const ok = await press(button, context);
        if (!ok) {
          throw new HapStatusError(HAPStatus.SERVICE_COMMUNICATION_FAILURE);
        }
      });

    return service;
  });
}
