import { vi } from 'vitest';
import { CharUUID } from '../settings';
import type {
  BleSession,
  BleTransport,
  ConnectOptions,
  DeviceHandle,
  DisconnectCallback,
  GattCharacteristic,
  ServiceCatalog,
} from './transport';

export function createMockLog() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

export class FakeCharacteristic implements GattCharacteristic {
  readonly writes: string[] = [];
  readonly writeErrors: Error[] = [];

  constructor(readonly uuid: string, private readonly value = Buffer.alloc(0)) {}

  async write(data: Buffer, _withResponse: boolean): Promise<void> {
    const err = this.writeErrors.shift();
    if (err) {
      throw err;
    }
    this.writes.push(data.toString('hex'));
  }

  async read(): Promise<Buffer> {
    return this.value;
  }
}

export class FakeCatalog implements ServiceCatalog {
  constructor(private readonly characteristics: GattCharacteristic[]) {}

  getCharacteristic(uuid: string): GattCharacteristic | undefined {
    return this.characteristics.find((characteristic) => characteristic.uuid === uuid);
  }
}

export interface SessionFailures {
  refresh: Error[];
  disconnect: Error[];
}

export class FakeSession implements BleSession {
  connected = true;
  readonly disconnect = vi.fn(async () => {
    const err = this.failures.disconnect.shift();
    if (err) {
      throw err;
    }
    this.drop();
  });
  readonly refreshServices = vi.fn(async () => {
    const err = this.failures.refresh.shift();
    if (err) {
      throw err;
    }
    this.services = this.freshServices;
    return this.services;
  });

  constructor(
    public services: ServiceCatalog,
    private readonly freshServices: ServiceCatalog,
    private readonly onDisconnect: DisconnectCallback,
    private readonly failures: SessionFailures = { refresh: [], disconnect: [] },
  ) {}

  get isConnected(): boolean {
    return this.connected;
  }

  /** Simulate the link going away; notifies the owner like a real stack would. */
  drop(): void {
    if (!this.connected) {
      return;
    }
    this.connected = false;
    this.onDisconnect(this);
  }
}

export function standardCharacteristics() {
  return {
    write: new FakeCharacteristic(CharUUID.Write),
    manufacturer: new FakeCharacteristic(CharUUID.ManufacturerName, Buffer.from('HiLighting\0\0')),
    firmware: new FakeCharacteristic(CharUUID.FirmwareRevision, Buffer.from(' V2.1 ')),
    model: new FakeCharacteristic(CharUUID.SoftwareNumber, Buffer.from('HL-RGB')),
  };
}

/** In-process transport that counts connects and hands out {@link FakeSession}s. */
export class FakeTransport implements BleTransport {
  readonly sessions: FakeSession[] = [];
  readonly connectErrors: Error[] = [];
  /** Failures consumed in order by every session's refresh and disconnect. */
  readonly sessionFailures: SessionFailures = { refresh: [], disconnect: [] };
  readonly chars = standardCharacteristics();
  /** Catalog handed out on connect; defaults to every characteristic. */
  initialCharacteristics: GattCharacteristic[] = Object.values(this.chars);
  /** Catalog returned by a forced refresh. */
  freshCharacteristics: GattCharacteristic[] = Object.values(this.chars);
  connectCount = 0;
  lastOptions: ConnectOptions | undefined;

  readonly resolveDevice = vi.fn(async (address: string): Promise<DeviceHandle> => ({
    address,
    name: 'Test Strip',
  }));

  get lastSession(): FakeSession | undefined {
    return this.sessions[this.sessions.length - 1];
  }

  async establishConnection(
    _device: DeviceHandle,
    _name: string,
    onDisconnect: DisconnectCallback,
    options?: ConnectOptions,
  ): Promise<BleSession> {
    this.connectCount++;
    this.lastOptions = options;
    await Promise.resolve();
    const err = this.connectErrors.shift();
    if (err) {
      throw err;
    }
    const session = new FakeSession(
      new FakeCatalog(this.initialCharacteristics),
      new FakeCatalog(this.freshCharacteristics),
      onDisconnect,
      this.sessionFailures,
    );
    this.sessions.push(session);
    return session;
  }
}

export const flushPromises = () => new Promise<void>((resolve) => setImmediate(resolve));
