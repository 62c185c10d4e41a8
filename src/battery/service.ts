import {Service} from 'homebridge';
import {CanvasPlatformAccessory} from '../platformAccessory.js';
import {DeviceState} from '../canvas/client.js';
import {batterySensor, readSensor} from '../presentation/sensors.js';

export interface BatteryService {
  service: Service;
  publish: (state: DeviceState | null) => void;
}

export function createBatteryService(platformAccessory: CanvasPlatformAccessory, lowBatteryThreshold: number): BatteryService {
  const {platform, accessory, context} = platformAccessory;
  const {StatusLowBattery, BatteryLevel, ChargingState} = platform.Characteristic;
  const {BATTERY_LEVEL_LOW, BATTERY_LEVEL_NORMAL} = StatusLowBattery;
  const batteryService = accessory.getService(platform.Service.Battery) ||
    accessory.addService(platform.Service.Battery, `${accessory.displayName} Battery`);

  batteryService.setCharacteristic(ChargingState, ChargingState.NOT_CHARGEABLE);

  const toStatus = (level: number) => level < lowBatteryThreshold ? BATTERY_LEVEL_LOW : BATTERY_LEVEL_NORMAL;

  batteryService.getCharacteristic(StatusLowBattery)
    .onGet(() =>
      readSensor(batterySensor, context)
        .then(r => {
          return typeof r.value === 'number' ? toStatus(r.value) : null;
        }));

  batteryService.getCharacteristic(BatteryLevel)
    .onGet(() =>
      readSensor(batterySensor, context).then(r => {
        return typeof r.value === 'number' ? r.value : null;
      }));

  return {
    service: batteryService,
    publish: state => {
      if (!state) {
        return;
      }
      batteryService.updateCharacteristic(BatteryLevel, state.battery);
      batteryService.updateCharacteristic(StatusLowBattery, toStatus(state.battery));
    },
  };
}
