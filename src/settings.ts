import type { Logger, PlatformConfig } from 'homebridge';

export const PLUGIN_NAME = 'homebridge-hilighting-ble';
export const PLATFORM_NAME = 'HiLightingBLE';

// BLE GATT UUIDs — write goes through the Nordic UART RX characteristic,
// the rest are standard Device Information characteristics
export const CharUUID = {
  Write:            '6e400002-b5a3-f393-e0a9-e50e24dcca9e',
  FirmwareRevision: '00002a26-0000-1000-8000-00805f9b34fb',
  SoftwareNumber:   '00002a28-0000-1000-8000-00805f9b34fb',
  ManufacturerName: '00002a29-0000-1000-8000-00805f9b34fb',
} as const;

export const BLE_SCAN_TIMEOUT = 15000;
export const DEFAULT_IDLE_TIMEOUT = 30;

export type Log = Pick<Logger, 'debug' | 'info' | 'warn' | 'error'>;

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function defaultDisplayName(address: string, advertisedName?: string): string {
  return advertisedName || `HiLighting-${address.slice(-5)}`;
}

export interface HiLightingDeviceConfig {
  name?: string;
  address: string;
  idleTimeout: number;
  scanTimeout: number;
  effectSwitches: boolean;
  effectSpeedControl: 'fan' | 'none';
  manufacturer: string;
  model: string;
}

export interface HiLightingPlatformConfig extends PlatformConfig {
  devices?: Partial<HiLightingDeviceConfig>[];
}

export function resolveDeviceConfig(raw: Partial<HiLightingDeviceConfig>): HiLightingDeviceConfig {
  return {
    name: raw.name?.trim() || undefined,
    address: raw.address?.trim() ?? '',
    idleTimeout: Math.max(0, raw.idleTimeout ?? DEFAULT_IDLE_TIMEOUT),
    scanTimeout: raw.scanTimeout ?? BLE_SCAN_TIMEOUT / 1000,
    effectSwitches: raw.effectSwitches ?? true,
    effectSpeedControl: raw.effectSpeedControl ?? 'fan',
    manufacturer: raw.manufacturer ?? 'HiLighting',
    model: raw.model ?? 'BLE LED Controller',
  };
}
