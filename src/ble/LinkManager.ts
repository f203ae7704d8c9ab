import type { Log } from '../settings';
import { CharUUID, defaultDisplayName, errorMessage } from '../settings';
import * as commands from '../protocol/commands';
import { EFFECT_LIST, EFFECT_OFF, effectId } from '../protocol/constants';
import { createDefaultState } from '../protocol/state';
import type { DeviceInfo, LightState } from '../protocol/state';
import { AsyncLock } from './AsyncLock';
import { BleTransportError } from './errors';
import { withRetry } from './retry';
import type { RetryPolicy, Sleep } from './retry';
import type { BleSession, BleTransport, DeviceHandle, GattCharacteristic, ServiceCatalog } from './transport';

export enum ConnectionState {
  Disconnected = 'disconnected',
  Connecting   = 'connecting',
  Connected    = 'connected',
}

export interface LinkManagerOptions {
  /** Seconds without traffic before the link is closed; 0 keeps it open. */
  idleTimeout: number;
  /** Overrides the advertised name / address-derived display name. */
  name?: string;
  retryPolicy?: RetryPolicy;
  sleep?: Sleep;
}

interface InfoCharacteristics {
  manufacturer: GattCharacteristic | null;
  firmware: GattCharacteristic | null;
  model: GattCharacteristic | null;
}

const NO_INFO_CHARACTERISTICS: InfoCharacteristics = { manufacturer: null, firmware: null, model: null };

/**
 * Keeps one command link to one HiLighting controller.
 *
 * The link is opened lazily by the first command, closed again after
 * `idleTimeout` seconds without traffic, and re-opened by the next command.
 * Every command runs inside the retry policy, reconnect included.
 *
 * {@link LinkManager.state} mirrors the last command that was written
 * successfully. It is not read back from the device.
 */
export class LinkManager {
  readonly address: string;
  readonly name: string;
  readonly state: LightState = createDefaultState();

  private linkState = ConnectionState.Disconnected;
  private session: BleSession | null = null;
  private writeCharacteristic: GattCharacteristic | null = null;
  private infoCharacteristics: InfoCharacteristics = NO_INFO_CHARACTERISTICS;
  private expectedDisconnect = false;
  private idleTimer: ReturnType<typeof setTimeout> | null = null;
  private readonly connectLock = new AsyncLock();
  private readonly idleTimeout: number;

  /** Resolve the device for `address` first; fails if the adapter cannot see it. */
  static async create(
    transport: BleTransport,
    address: string,
    options: LinkManagerOptions,
    log: Log,
  ): Promise<LinkManager> {
    const device = await transport.resolveDevice(address);
    return new LinkManager(transport, device, options, log);
  }

  constructor(
    private readonly transport: BleTransport,
    private readonly device: DeviceHandle,
    private readonly options: LinkManagerOptions,
    private readonly log: Log,
  ) {
    this.address = device.address;
    this.name = options.name || defaultDisplayName(device.address, device.name);
    this.idleTimeout = Math.max(0, options.idleTimeout);
  }

  get connectionState(): ConnectionState {
    if (this.linkState === ConnectionState.Connected && !this.session?.isConnected) {
      return ConnectionState.Disconnected;
    }
    return this.linkState;
  }

  get effectList(): readonly string[] {
    return EFFECT_LIST;
  }

  // --- Commands ---

  async turnOn(): Promise<void> {
    await this.retry('turnOn', async () => {
      await this.write(commands.setPower(true));
      this.state.on = true;
    });
  }

  async turnOff(): Promise<void> {
    await this.retry('turnOff', async () => {
      await this.write(commands.setPower(false));
      this.state.on = false;
    });
  }

  async setColor(r: number, g: number, b: number): Promise<void> {
    await this.retry('setColor', async () => {
      const packet = commands.setColor([r, g, b]);
      await this.write(packet);
      this.state.rgb = [packet[3], packet[4], packet[5]];
      // Color and effect are exclusive modes on the controller
      this.state.effect = EFFECT_OFF;
    });
  }

  async setBrightness(brightness: number): Promise<void> {
    await this.retry('setBrightness', async () => {
      await this.write(commands.setBrightness(brightness));
      this.state.brightness = Math.max(0, Math.min(255, Math.round(brightness)));
    });
  }

  async setEffect(effect: string): Promise<void> {
    const id = effectId(effect);
    if (id === undefined) {
      this.log.error('%s: Unsupported effect: %s', this.name, effect);
      return;
    }
    await this.retry('setEffect', async () => {
      await this.write(commands.setEffect(id));
      this.state.effect = effect;
    });
  }

  async setEffectSpeed(speed: number): Promise<void> {
    await this.retry('setEffectSpeed', async () => {
      await this.write(commands.setEffectSpeed(speed));
    });
  }

  async readDeviceInfo(): Promise<DeviceInfo> {
    return this.retry('readDeviceInfo', async () => {
      await this.ensureConnected();
      const { manufacturer, model, firmware } = this.infoCharacteristics;
      const info: DeviceInfo = {
        manufacturer: await this.readString(manufacturer),
        model: await this.readString(model),
        firmwareRevision: await this.readString(firmware),
      };
      this.resetIdleTimer();
      return info;
    });
  }

  /** Close the link now, e.g. on shutdown. Safe to call when already closed. */
  async disconnect(): Promise<void> {
    this.clearIdleTimer();
    this.expectedDisconnect = true;
    await this.executeDisconnect();
  }

  // --- Internal ---

  private retry<T>(operation: string, task: () => Promise<T>): Promise<T> {
    return withRetry(task, {
      name: this.name,
      operation,
      log: this.log,
      policy: this.options.retryPolicy,
      sleep: this.options.sleep,
    });
  }

  private async write(data: Buffer): Promise<void> {
    await this.ensureConnected();
    const characteristic = this.writeCharacteristic;
    if (!characteristic) {
      throw new BleTransportError(`Characteristic ${CharUUID.Write} was not found`);
    }
    this.log.debug('%s: Writing %s', this.name, data.toString('hex'));
    await characteristic.write(data, false);
    this.resetIdleTimer();
  }

  private async readString(characteristic: GattCharacteristic | null): Promise<string | undefined> {
    if (!characteristic) {
      return undefined;
    }
    const value = await characteristic.read();
    return value.toString('utf8').replace(/\0+$/, '').trim();
  }

  private isLinkUp(): boolean {
    return this.linkState === ConnectionState.Connected
      && this.session !== null
      && this.session.isConnected;
  }

  private async ensureConnected(): Promise<void> {
    if (!this.connectLock.isLocked && this.isLinkUp()) {
      this.resetIdleTimer();
      return;
    }

    await this.connectLock.runExclusive(async () => {
      // Another caller may have connected while we waited
      if (this.isLinkUp()) {
        this.resetIdleTimer();
        return;
      }
      this.clearSession();
      this.linkState = ConnectionState.Connecting;
      this.log.debug('%s: Connecting...', this.name);

      let session: BleSession | null = null;
      try {
        session = await this.transport.establishConnection(
          this.device,
          this.name,
          (dropped) => this.handleDisconnect(dropped),
          { useCachedServices: true, deviceCallback: () => this.device },
        );

        if (!this.resolveCharacteristics(session.services)) {
          this.log.debug('%s: Initial resolve failed, trying with fresh services', this.name);
          this.resolveCharacteristics(await session.refreshServices());
        }
      } catch (err) {
        this.linkState = ConnectionState.Disconnected;
        this.clearSession();
        if (session) {
          await this.closeOrphan(session);
        }
        throw err;
      }

      this.session = session;
      this.linkState = ConnectionState.Connected;
      this.log.debug('%s: Connected', this.name);
      this.resetIdleTimer();
    });
  }

  private async closeOrphan(session: BleSession): Promise<void> {
    this.expectedDisconnect = true;
    try {
      await session.disconnect();
    } catch (err) {
      this.log.warn('%s: Error closing failed session: %s', this.name, errorMessage(err));
    }
  }

  private resolveCharacteristics(services: ServiceCatalog): boolean {
    this.writeCharacteristic = services.getCharacteristic(CharUUID.Write) ?? null;
    this.infoCharacteristics = {
      manufacturer: services.getCharacteristic(CharUUID.ManufacturerName) ?? null,
      firmware: services.getCharacteristic(CharUUID.FirmwareRevision) ?? null,
      model: services.getCharacteristic(CharUUID.SoftwareNumber) ?? null,
    };
    const { manufacturer, firmware, model } = this.infoCharacteristics;
    return this.writeCharacteristic !== null && manufacturer !== null && firmware !== null && model !== null;
  }

  private clearSession(): void {
    this.session = null;
    this.writeCharacteristic = null;
    this.infoCharacteristics = NO_INFO_CHARACTERISTICS;
  }

  private handleDisconnect(_session: BleSession): void {
    if (this.expectedDisconnect) {
      this.log.debug('%s: Disconnected (expected)', this.name);
    } else {
      // Reconnect happens lazily on the next command
      this.log.warn('%s: Unexpected disconnect', this.name);
    }
  }

  private resetIdleTimer(): void {
    this.clearIdleTimer();
    this.expectedDisconnect = false;
    if (this.idleTimeout > 0) {
      this.idleTimer = setTimeout(() => this.onIdleTimeout(), this.idleTimeout * 1000);
    }
  }

  private clearIdleTimer(): void {
    if (this.idleTimer) {
      clearTimeout(this.idleTimer);
      this.idleTimer = null;
    }
  }

  private onIdleTimeout(): void {
    this.idleTimer = null;
    this.expectedDisconnect = true;
    this.log.debug('%s: Idle timeout, disconnecting', this.name);
    this.executeDisconnect().catch((err) => {
      this.log.warn('%s: Error during idle disconnect: %s', this.name, errorMessage(err));
    });
  }

  private async executeDisconnect(): Promise<void> {
    await this.connectLock.runExclusive(async () => {
      this.clearIdleTimer();
      const session = this.session;
      this.clearSession();
      this.linkState = ConnectionState.Disconnected;
      if (session && session.isConnected) {
        this.expectedDisconnect = true;
        await session.disconnect();
        this.log.debug('%s: Disconnected', this.name);
      }
    });
  }
}
