import { describe, expect, it } from 'vitest';
import { defaultDisplayName, errorMessage, resolveDeviceConfig } from './settings';

describe('resolveDeviceConfig', () => {
  it('fills in defaults', () => {
    expect(resolveDeviceConfig({ address: 'AA:BB:CC:DD:EE:FF' })).toEqual({
      name: undefined,
      address: 'AA:BB:CC:DD:EE:FF',
      idleTimeout: 30,
      scanTimeout: 15,
      effectSwitches: true,
      effectSpeedControl: 'fan',
      manufacturer: 'HiLighting',
      model: 'BLE LED Controller',
    });
  });

  it('keeps explicit values', () => {
    const config = resolveDeviceConfig({
      name: ' Desk Strip ',
      address: ' 11:22:33:44:55:66 ',
      idleTimeout: 0,
      effectSwitches: false,
      effectSpeedControl: 'none',
    });

    expect(config.name).toBe('Desk Strip');
    expect(config.address).toBe('11:22:33:44:55:66');
    expect(config.idleTimeout).toBe(0);
    expect(config.effectSwitches).toBe(false);
    expect(config.effectSpeedControl).toBe('none');
  });

  it('treats a negative idle timeout as disabled', () => {
    expect(resolveDeviceConfig({ idleTimeout: -5 }).idleTimeout).toBe(0);
  });

  it('treats a blank name as unset', () => {
    expect(resolveDeviceConfig({ name: '   ' }).name).toBeUndefined();
  });
});

describe('defaultDisplayName', () => {
  it('prefers the advertised name', () => {
    expect(defaultDisplayName('AA:BB:CC:DD:EE:FF', 'LED Strip')).toBe('LED Strip');
  });

  it('derives a name from the address suffix', () => {
    expect(defaultDisplayName('AA:BB:CC:DD:EE:FF')).toBe('HiLighting-EE:FF');
    expect(defaultDisplayName('AA:BB:CC:DD:EE:FF', '')).toBe('HiLighting-EE:FF');
  });
});

describe('errorMessage', () => {
  it('reads Error messages and stringifies the rest', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('plain')).toBe('plain');
    expect(errorMessage(7)).toBe('7');
  });
});
