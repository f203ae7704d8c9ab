import noble from '@stoprocent/noble';
import type { Log } from '../settings';
import { BLE_SCAN_TIMEOUT, errorMessage } from '../settings';
import { BleTransportError, DeviceNotFoundError, toTransportError } from './errors';
import { sleep } from './retry';
import type {
  BleSession,
  BleTransport,
  ConnectOptions,
  DeviceHandle,
  DisconnectCallback,
  GattCharacteristic,
  ServiceCatalog,
} from './transport';

export const CONNECT_ATTEMPTS = 2;
export const CONNECT_BACKOFF_TIME = 250;

const SIG_BASE_UUID = /^0000([0-9a-f]{4})00001000800000805f9b34fb$/;

/**
 * Noble reports UUIDs lower case without dashes, and shortens Bluetooth SIG
 * UUIDs to 16 bits. Bring any form into that shape.
 */
export function normalizeUuid(uuid: string): string {
  const compact = uuid.toLowerCase().replace(/-/g, '');
  const sig = SIG_BASE_UUID.exec(compact);
  return sig ? sig[1] : compact;
}

export function normalizeAddress(address: string): string {
  return address.toLowerCase().replace(/[:-]/g, '');
}

function peripheralAddress(peripheral: noble.Peripheral): string {
  return peripheral.address !== '' && peripheral.address !== 'unknown'
    ? peripheral.address
    : peripheral.id ?? peripheral.uuid ?? 'unknown';
}

class NobleCharacteristic implements GattCharacteristic {
  constructor(private readonly characteristic: noble.Characteristic) {}

  get uuid(): string {
    return this.characteristic.uuid;
  }

  async write(data: Buffer, withResponse: boolean): Promise<void> {
    try {
      await this.characteristic.writeAsync(data, !withResponse);
    } catch (err) {
      throw toTransportError(err, `Write to ${this.uuid} failed`);
    }
  }

  async read(): Promise<Buffer> {
    try {
      return await this.characteristic.readAsync();
    } catch (err) {
      throw toTransportError(err, `Read from ${this.uuid} failed`);
    }
  }
}

class NobleServiceCatalog implements ServiceCatalog {
  private readonly characteristics = new Map<string, NobleCharacteristic>();

  constructor(characteristics: noble.Characteristic[]) {
    for (const characteristic of characteristics) {
      this.characteristics.set(normalizeUuid(characteristic.uuid), new NobleCharacteristic(characteristic));
    }
  }

  get uuids(): string[] {
    return [...this.characteristics.keys()];
  }

  getCharacteristic(uuid: string): GattCharacteristic | undefined {
    return this.characteristics.get(normalizeUuid(uuid));
  }
}

class NobleSession implements BleSession {
  private catalog = new NobleServiceCatalog([]);
  private dropped = false;

  constructor(
    private readonly peripheral: noble.Peripheral,
    private readonly onCatalog: (catalog: NobleServiceCatalog) => void,
  ) {}

  get isConnected(): boolean {
    return !this.dropped && this.peripheral.state === 'connected';
  }

  get services(): ServiceCatalog {
    return this.catalog;
  }

  markDropped(): void {
    this.dropped = true;
  }

  async discover(cachedUuids: string[] | undefined): Promise<void> {
    try {
      const { characteristics } = cachedUuids && cachedUuids.length > 0
        ? await this.peripheral.discoverSomeServicesAndCharacteristicsAsync([], cachedUuids)
        : await this.peripheral.discoverAllServicesAndCharacteristicsAsync();
      this.setCatalog(new NobleServiceCatalog(characteristics));
    } catch (err) {
      throw toTransportError(err, 'Service discovery failed');
    }
  }

  async refreshServices(): Promise<ServiceCatalog> {
    await this.discover(undefined);
    return this.catalog;
  }

  async disconnect(): Promise<void> {
    if (this.dropped) {
      return;
    }
    try {
      await this.peripheral.disconnectAsync();
    } catch (err) {
      throw toTransportError(err, 'Disconnect failed');
    }
  }

  /** Disconnect without waiting for the drop notification. */
  async close(): Promise<void> {
    this.dropped = true;
    try {
      await this.peripheral.disconnectAsync();
    } catch (err) {
      throw toTransportError(err, 'Disconnect failed');
    }
  }

  private setCatalog(catalog: NobleServiceCatalog): void {
    this.catalog = catalog;
    this.onCatalog(catalog);
  }
}

/**
 * BLE transport on top of noble: resolves a device by scanning for its address,
 * opens sessions with a couple of connect attempts, and remembers which
 * characteristics each device exposed so reconnects can skip full discovery.
 */
export class NobleTransport implements BleTransport {
  private readonly peripherals = new Map<string, noble.Peripheral>();
  private readonly serviceCache = new Map<string, string[]>();

  constructor(
    private readonly log: Log,
    private readonly scanTimeout = BLE_SCAN_TIMEOUT,
  ) {}

  async resolveDevice(address: string): Promise<DeviceHandle> {
    this.log.debug('BLE: Starting scan for %s...', address);
    const peripheral = await this.scanForDevice(address);
    if (!peripheral) {
      throw new DeviceNotFoundError(address);
    }
    this.peripherals.set(normalizeAddress(address), peripheral);
    return {
      address,
      name: peripheral.advertisement?.localName || undefined,
    };
  }

  async establishConnection(
    device: DeviceHandle,
    name: string,
    onDisconnect: DisconnectCallback,
    options: ConnectOptions = {},
  ): Promise<BleSession> {
    for (let attempt = 1; ; attempt++) {
      const target = options.deviceCallback?.() ?? device;
      try {
        return await this.connectOnce(target, name, onDisconnect, options.useCachedServices ?? false);
      } catch (err) {
        if (err instanceof DeviceNotFoundError || attempt >= CONNECT_ATTEMPTS) {
          throw err;
        }
        this.log.debug('%s: Connect attempt %d/%d failed: %s', name, attempt, CONNECT_ATTEMPTS, errorMessage(err));
        await sleep(CONNECT_BACKOFF_TIME);
      }
    }
  }

  private async connectOnce(
    device: DeviceHandle,
    name: string,
    onDisconnect: DisconnectCallback,
    useCachedServices: boolean,
  ): Promise<BleSession> {
    const key = normalizeAddress(device.address);
    let peripheral = this.peripherals.get(key);
    if (!peripheral) {
      await this.resolveDevice(device.address);
      peripheral = this.peripherals.get(key);
    }
    if (!peripheral) {
      throw new DeviceNotFoundError(device.address);
    }

    const session = new NobleSession(peripheral, (catalog) => {
      this.serviceCache.set(key, catalog.uuids);
    });
    // Register disconnect handler before connecting so an early drop is not missed
    const handleDisconnect = () => {
      session.markDropped();
      onDisconnect(session);
    };
    peripheral.once('disconnect', handleDisconnect);

    this.log.debug('%s: Connecting to %s...', name, peripheralAddress(peripheral));
    try {
      await peripheral.connectAsync();
    } catch (err) {
      peripheral.removeListener('disconnect', handleDisconnect);
      throw toTransportError(err, `Connect to ${device.address} failed`);
    }

    try {
      await session.discover(useCachedServices ? this.serviceCache.get(key) : undefined);
    } catch (err) {
      // Teardown of a half-open session is ours, not a drop the owner should hear about
      peripheral.removeListener('disconnect', handleDisconnect);
      await session.close().catch((disconnectErr: unknown) => {
        this.log.debug('%s: Disconnect after failed discovery: %s', name, errorMessage(disconnectErr));
      });
      throw err;
    }
    return session;
  }

  private scanForDevice(address: string): Promise<noble.Peripheral | null> {
    const normalized = normalizeAddress(address);
    return this.scan((peripheral: noble.Peripheral) => {
      const id = normalizeAddress(peripheral.id ?? '');
      const addr = normalizeAddress(peripheral.address ?? '');
      const uuid = normalizeAddress(peripheral.uuid ?? '');
      return id === normalized || addr === normalized || uuid === normalized;
    });
  }

  private scan(match: (peripheral: noble.Peripheral) => boolean): Promise<noble.Peripheral | null> {
    return new Promise((resolve, reject) => {
      let scanning = false;

      const finish = (outcome: () => void) => {
        clearTimeout(timeout);
        noble.removeListener('discover', onDiscover);
        noble.removeListener('stateChange', onStateChange);
        if (scanning) {
          scanning = false;
          noble.stopScanning();
        }
        outcome();
      };

      const onDiscover = (peripheral: noble.Peripheral) => {
        if (!match(peripheral)) {
          return;
        }
        this.log.info('BLE: Discovered device: %s', peripheral.advertisement?.localName ?? '(unnamed)');
        finish(() => resolve(peripheral));
      };

      const startScan = () => {
        scanning = true;
        noble.startScanning([], false, (err?: Error) => {
          if (err) {
            finish(() => reject(toTransportError(err, 'Scan failed')));
          }
        });
      };

      // Adapter may still be powering up; wait for it only until the scan timeout
      const onStateChange = (state: string) => {
        noble.removeListener('stateChange', onStateChange);
        if (state === 'poweredOn') {
          startScan();
        } else {
          finish(() => reject(new BleTransportError(`Bluetooth adapter state: ${state}`)));
        }
      };

      const timeout = setTimeout(() => finish(() => resolve(null)), this.scanTimeout);

      noble.on('discover', onDiscover);
      if (noble.state === 'poweredOn') {
        startScan();
      } else {
        noble.on('stateChange', onStateChange);
      }
    });
  }
}
