import type {
  PlatformAccessory,
  Service,
  Characteristic,
  CharacteristicValue,
} from 'homebridge';
import { HapStatusError, HAPStatus } from 'hap-nodejs';
import type { HiLightingPlatform } from './platform';
import type { HiLightingDeviceConfig } from './settings';
import { errorMessage } from './settings';
import type { LinkManager } from './ble/LinkManager';
import { EFFECT_OFF } from './protocol/constants';
import { hsToRgb, levelToPercent, percentToLevel, rgbToHs } from './color';

interface EffectSwitch {
  service: Service;
  effect: string;
}

export class HiLightingAccessory {
  private readonly lightService: Service;
  private readonly effectSwitches: EffectSwitch[] = [];
  private speedService: Service | null = null;

  private pendingHue: number;
  private pendingSaturation: number;
  private colorDebounceTimer: ReturnType<typeof setTimeout> | null = null;
  private speedDebounceTimer: ReturnType<typeof setTimeout> | null = null;

  private readonly Characteristic: typeof Characteristic;

  constructor(
    private readonly platform: HiLightingPlatform,
    private readonly accessory: PlatformAccessory,
    private readonly config: HiLightingDeviceConfig,
    private readonly link: LinkManager,
  ) {
    this.Characteristic = this.platform.api.hap.Characteristic;
    const Service = this.platform.api.hap.Service;

    // --- Accessory Information ---
    const infoService = this.accessory.getService(Service.AccessoryInformation) ??
      this.accessory.addService(Service.AccessoryInformation);
    infoService
      .setCharacteristic(this.Characteristic.Manufacturer, this.config.manufacturer)
      .setCharacteristic(this.Characteristic.Model, this.config.model)
      .setCharacteristic(this.Characteristic.SerialNumber, this.link.address)
      .setCharacteristic(this.Characteristic.FirmwareRevision, '0.0');

    this.link.readDeviceInfo()
      .then((info) => {
        if (info.manufacturer) {
          infoService.updateCharacteristic(this.Characteristic.Manufacturer, info.manufacturer);
        }
        if (info.model) {
          infoService.updateCharacteristic(this.Characteristic.Model, info.model);
        }
        if (info.firmwareRevision) {
          this.platform.log.info('%s: Firmware version: %s', this.link.name, info.firmwareRevision);
          infoService.updateCharacteristic(this.Characteristic.FirmwareRevision, info.firmwareRevision);
        }
      })
      .catch((err) => {
        this.platform.log.warn('%s: Reading device info failed: %s', this.link.name, errorMessage(err));
      });

    // --- Lightbulb ---
    const { hue, saturation } = rgbToHs(this.link.state.rgb);
    this.pendingHue = hue;
    this.pendingSaturation = saturation;

    this.lightService = this.accessory.getService(Service.Lightbulb) ??
      this.accessory.addService(Service.Lightbulb, this.link.name);
    this.lightService.getCharacteristic(this.Characteristic.On)
      .onGet(() => this.link.state.on)
      .onSet(this.setOn.bind(this));
    this.lightService.getCharacteristic(this.Characteristic.Brightness)
      .onGet(() => levelToPercent(this.link.state.brightness))
      .onSet(this.setBrightness.bind(this));
    this.lightService.getCharacteristic(this.Characteristic.Hue)
      .onGet(() => this.pendingHue)
      .onSet((value: CharacteristicValue) => {
        this.pendingHue = value as number;
        this.scheduleColor();
      });
    this.lightService.getCharacteristic(this.Characteristic.Saturation)
      .onGet(() => this.pendingSaturation)
      .onSet((value: CharacteristicValue) => {
        this.pendingSaturation = value as number;
        this.scheduleColor();
      });

    // --- Effect Switches ---
    for (const effect of this.link.effectList) {
      const subtype = `effect-${effect.replace(/\s+/g, '-').toLowerCase()}`;
      const existing = this.accessory.getServiceById(Service.Switch, subtype);
      if (!this.config.effectSwitches) {
        if (existing) {
          this.accessory.removeService(existing);
        }
        continue;
      }

      const switchService = existing ?? this.accessory.addService(Service.Switch, effect, subtype);
      switchService.addOptionalCharacteristic(this.Characteristic.ConfiguredName);
      switchService.getCharacteristic(this.Characteristic.ConfiguredName).setValue(effect);
      switchService.getCharacteristic(this.Characteristic.On)
        .onGet(() => this.link.state.effect === effect)
        .onSet(async (value: CharacteristicValue) => {
          try {
            if (value) {
              await this.link.setEffect(effect);
            } else if (this.link.state.effect === effect) {
              // Leaving an effect falls back to the last static color
              const [r, g, b] = this.link.state.rgb;
              await this.link.setColor(r, g, b);
            }
            this.updateEffectSwitches();
          } catch (err) {
            this.platform.log.error('setEffect failed: %s', errorMessage(err));
            throw new HapStatusError(HAPStatus.SERVICE_COMMUNICATION_FAILURE);
          }
        });

      this.effectSwitches.push({ service: switchService, effect });
    }

    // --- Effect Speed (Fan proxy) ---
    const existingFan = this.accessory.getServiceById(Service.Fan, 'effect-speed');
    if (this.config.effectSpeedControl === 'fan') {
      this.speedService = existingFan ?? this.accessory.addService(Service.Fan, 'Effect Speed', 'effect-speed');
      this.speedService.addOptionalCharacteristic(this.Characteristic.ConfiguredName);
      this.speedService.getCharacteristic(this.Characteristic.ConfiguredName).setValue('Effect Speed');
      this.speedService.getCharacteristic(this.Characteristic.On)
        .onGet(() => this.link.state.effect !== EFFECT_OFF);
      this.speedService.getCharacteristic(this.Characteristic.RotationSpeed)
        .onSet(this.setEffectSpeed.bind(this));
    } else if (existingFan) {
      this.accessory.removeService(existingFan);
    }
  }

  // --- Power ---

  private async setOn(value: CharacteristicValue): Promise<void> {
    try {
      if (value) {
        await this.link.turnOn();
      } else {
        await this.link.turnOff();
      }
    } catch (err) {
      this.platform.log.error('setOn failed: %s', errorMessage(err));
      throw new HapStatusError(HAPStatus.SERVICE_COMMUNICATION_FAILURE);
    }
  }

  // --- Brightness ---
  // HomeKit percent 0-100 maps to 0-255

  private async setBrightness(value: CharacteristicValue): Promise<void> {
    try {
      await this.link.setBrightness(percentToLevel(value as number));
    } catch (err) {
      this.platform.log.error('setBrightness failed: %s', errorMessage(err));
      throw new HapStatusError(HAPStatus.SERVICE_COMMUNICATION_FAILURE);
    }
  }

  // --- Color ---

  private scheduleColor(): void {
    // Debounce: Hue and Saturation arrive as two separate writes
    if (this.colorDebounceTimer) {
      clearTimeout(this.colorDebounceTimer);
    }
    this.colorDebounceTimer = setTimeout(() => {
      this.colorDebounceTimer = null;
      const [r, g, b] = hsToRgb(this.pendingHue, this.pendingSaturation);
      this.link.setColor(r, g, b)
        .then(() => this.updateEffectSwitches())
        .catch((err) => {
          this.platform.log.error('Failed to set color: %s', errorMessage(err));
        });
    }, 100);
  }

  // --- Effect Speed ---

  private setEffectSpeed(value: CharacteristicValue): void {
    const percent = value as number;

    // Debounce: HomeKit slider sends many rapid updates
    if (this.speedDebounceTimer) {
      clearTimeout(this.speedDebounceTimer);
    }
    this.speedDebounceTimer = setTimeout(() => {
      this.speedDebounceTimer = null;
      this.link.setEffectSpeed(percent).catch((err) => {
        this.platform.log.error('Failed to set effect speed: %s', errorMessage(err));
      });
    }, 100);
  }

  // --- Helpers ---

  private updateEffectSwitches(): void {
    for (const effectSwitch of this.effectSwitches) {
      effectSwitch.service.getCharacteristic(this.Characteristic.On)
        .updateValue(effectSwitch.effect === this.link.state.effect);
    }
    this.speedService?.getCharacteristic(this.Characteristic.On)
      .updateValue(this.link.state.effect !== EFFECT_OFF);
  }
}
