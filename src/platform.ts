import type {
  API,
  DynamicPlatformPlugin,
  Logger,
  PlatformAccessory,
} from 'homebridge';
import { PLATFORM_NAME, PLUGIN_NAME, errorMessage, resolveDeviceConfig } from './settings';
import type { HiLightingPlatformConfig } from './settings';
import { HiLightingAccessory } from './accessory';
import { NobleTransport } from './ble/NobleTransport';
import { LinkManager } from './ble/LinkManager';
import { DeviceNotFoundError } from './ble/errors';

export class HiLightingPlatform implements DynamicPlatformPlugin {
  private readonly cachedAccessories: PlatformAccessory[] = [];
  private handler: HiLightingAccessory | null = null;
  private link: LinkManager | null = null;

  constructor(
    public readonly log: Logger,
    public readonly config: HiLightingPlatformConfig,
    public readonly api: API,
  ) {
    this.log.info('HiLighting BLE platform initialized');

    this.api.on('didFinishLaunching', () => {
      this.discoverDevices().catch((err) => {
        this.log.error('Device setup failed: %s', errorMessage(err));
      });
    });

    this.api.on('shutdown', () => {
      this.link?.disconnect().catch((err) => {
        this.log.debug('Disconnect on shutdown failed: %s', errorMessage(err));
      });
    });
  }

  configureAccessory(accessory: PlatformAccessory): void {
    this.log.debug('Loading accessory from cache: %s', accessory.displayName);
    this.cachedAccessories.push(accessory);
  }

  private async discoverDevices(): Promise<void> {
    const devices = this.config.devices ?? [];
    if (devices.length === 0) {
      this.log.warn('No devices configured.');
      this.pruneCachedAccessories(null);
      return;
    }
    if (devices.length > 1) {
      this.log.warn('Multiple devices configured — only the first device is supported in this version.');
    }

    const deviceConfig = resolveDeviceConfig(devices[0]);
    if (!deviceConfig.address) {
      this.log.error('Device "%s" has no address configured.', deviceConfig.name ?? '(unnamed)');
      return;
    }
    this.log.info('Setting up device: %s', deviceConfig.address);

    const transport = new NobleTransport(this.log, deviceConfig.scanTimeout * 1000);
    try {
      this.link = await LinkManager.create(transport, deviceConfig.address, {
        idleTimeout: deviceConfig.idleTimeout,
        name: deviceConfig.name,
      }, this.log);
    } catch (err) {
      if (err instanceof DeviceNotFoundError) {
        this.log.error('Device %s not found. Check the address and that the strip is powered.', deviceConfig.address);
        return;
      }
      throw err;
    }
    const link = this.link;

    // Stable identity per BLE address
    const uuid = this.api.hap.uuid.generate('hilighting-ble:' + deviceConfig.address.toLowerCase());
    this.pruneCachedAccessories(uuid);

    let accessory = this.cachedAccessories.find((cached) => cached.UUID === uuid);
    if (accessory) {
      this.log.info('Restoring accessory from cache: %s', accessory.displayName);
      this.handler = new HiLightingAccessory(this, accessory, deviceConfig, link);
      this.api.updatePlatformAccessories([accessory]);
    } else {
      accessory = new this.api.platformAccessory(link.name, uuid, this.api.hap.Categories.LIGHTBULB);
      this.handler = new HiLightingAccessory(this, accessory, deviceConfig, link);
      this.api.registerPlatformAccessories(PLUGIN_NAME, PLATFORM_NAME, [accessory]);
    }
  }

  private pruneCachedAccessories(keepUuid: string | null): void {
    const stale = this.cachedAccessories.filter((cached) => cached.UUID !== keepUuid);
    if (stale.length > 0) {
      this.log.info('Removing %d stale accessory(s) from cache', stale.length);
      this.api.unregisterPlatformAccessories(PLUGIN_NAME, PLATFORM_NAME, stale);
    }
  }
}
