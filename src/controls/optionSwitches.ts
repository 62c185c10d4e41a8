import {CharacteristicValue, Service} from 'homebridge';
import {CanvasPlatformAccessory} from '../platformAccessory.js';
import {DeviceState} from '../canvas/client.js';
import {currentOption, readOption, SELECTS, selectOption, SelectDescription} from '../presentation/controls.js';

export interface OptionSwitches {
  services: Service[];
  publish: (state: DeviceState | null) => void;
}

type OptionSwitch = {
  select: SelectDescription;
  label: string;
  service: Service;
};

/**
 * HomeKit has no select control, so each option of a settings axis gets its own switch. The switch
 * of the current option is on; turning another one on selects it.
 */
export function createOptionSwitches(platformAccessory: CanvasPlatformAccessory): OptionSwitches {
  const {platform, accessory, context} = platformAccessory;
  const {On} = platform.Characteristic;
  const {HapStatusError, HAPStatus} = platform.api.hap;

  const switches: OptionSwitch[] = SELECTS.flatMap(select => select.axis.labels.map(label => {
    const subtype = `${select.key}:${label}`;
    const service = accessory.getServiceById(platform.Service.Switch, subtype) ||
      accessory.addService(platform.Service.Switch, `${select.name} ${label}`, subtype);
    return {select, label, service};
  }));

  const publish = (state: DeviceState | null) => {
    switches.forEach(({select, label, service}) => {
      service.updateCharacteristic(On, currentOption(select, state) === label);
    });
  };

  switches.forEach(({select, label, service}) => {
    service.getCharacteristic(On)
      .onGet(() => readOption(select, context).then(option => option === label))
      .onSet(async (value: CharacteristicValue) => {
        if (value !== true) {
          // an axis always has exactly one option selected
          publish(context.cache.runtime.get());
          return;
        }
        platform.log.info(`${accessory.displayName}: setting ${select.name} to ${label}`);
        let ok = false;
        try {
          ok = await selectOption(select, context, label);
        } catch (err) {
          platform.log.error(`${accessory.displayName}: ${err instanceof Error ? err.message : String(err)}`);
        }
        publish(context.cache.runtime.get());
        if (!ok) {
          throw new HapStatusError(HAPStatus.SERVICE_COMMUNICATION_FAILURE);
        }
      });
  });

  return {
    services: switches.map(({service}) => service),
    publish,
  };
}
