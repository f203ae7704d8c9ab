import { describe, expect, it } from 'vitest';
import { BleBusError, BleTransportError, DeviceNotFoundError, toTransportError } from './errors';

describe('toTransportError', () => {
  it('classifies bus failures', () => {
    const err = toTransportError(new Error('org.bluez.Error.InProgress'), 'Connect failed');

    expect(err).toBeInstanceOf(BleBusError);
    expect(err.message).toBe('Connect failed: org.bluez.Error.InProgress');
    expect(err.cause).toBeInstanceOf(Error);
  });

  it('wraps other failures as transport errors', () => {
    const err = toTransportError('timeout', 'Write failed');

    expect(err).toBeInstanceOf(BleTransportError);
    expect(err).not.toBeInstanceOf(BleBusError);
    expect(err.message).toBe('Write failed: timeout');
  });

  it('passes taxonomy errors through', () => {
    const original = new DeviceNotFoundError('AA:BB');

    expect(toTransportError(original, 'Connect failed')).toBe(original);
  });

  it('names each error class', () => {
    expect(new DeviceNotFoundError('AA:BB').name).toBe('DeviceNotFoundError');
    expect(new BleTransportError('x').name).toBe('BleTransportError');
    expect(new BleBusError('x').name).toBe('BleBusError');
  });
});
