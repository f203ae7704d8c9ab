/** Platform-supplied handle for a connectable peripheral. */
export interface DeviceHandle {
  readonly address: string;
  /** Advertised local name, when the peripheral sent one. */
  readonly name?: string;
}

export interface GattCharacteristic {
  readonly uuid: string;
  write(data: Buffer, withResponse: boolean): Promise<void>;
  read(): Promise<Buffer>;
}

export interface ServiceCatalog {
  /** Look up a characteristic by UUID in any of the discovered services. */
  getCharacteristic(uuid: string): GattCharacteristic | undefined;
}

/** A live connection to one peripheral. */
export interface BleSession {
  readonly isConnected: boolean;
  readonly services: ServiceCatalog;
  /** Discard the cached catalog and run full service discovery. */
  refreshServices(): Promise<ServiceCatalog>;
  disconnect(): Promise<void>;
}

export type DisconnectCallback = (session: BleSession) => void;

export interface ConnectOptions {
  useCachedServices?: boolean;
  /** Re-read the device handle before each connect attempt. */
  deviceCallback?: () => DeviceHandle;
}

export interface BleTransport {
  /** @throws {DeviceNotFoundError} when the address is unknown to the adapter */
  resolveDevice(address: string): Promise<DeviceHandle>;
  establishConnection(
    device: DeviceHandle,
    name: string,
    onDisconnect: DisconnectCallback,
    options?: ConnectOptions,
  ): Promise<BleSession>;
}
