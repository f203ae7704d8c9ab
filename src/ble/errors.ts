/**
 * Error taxonomy for the BLE link.
 *
 * Only {@link BleTransportError} (and its {@link BleBusError} subtype) is
 * eligible for retry. {@link DeviceNotFoundError} is permanent.
 */

export class HiLightingError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'HiLightingError';
  }
}

export class DeviceNotFoundError extends HiLightingError {
  constructor(readonly address: string, message = `Device ${address} not found`) {
    super(message);
    this.name = 'DeviceNotFoundError';
  }
}

export class BleTransportError extends HiLightingError {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'BleTransportError';
  }
}

export class BleBusError extends BleTransportError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = 'BleBusError';
  }
}

const BUS_ERROR_PATTERN = /\bhci\b|d-?bus|bluez/i;

/**
 * Wrap an error thrown by the BLE stack so the retry policy can classify it.
 * Errors that already belong to the taxonomy pass through untouched.
 */
export function toTransportError(err: unknown, context: string): HiLightingError {
  if (err instanceof HiLightingError) {
    return err;
  }
  const detail = err instanceof Error ? err.message : String(err);
  const message = `${context}: ${detail}`;
  return BUS_ERROR_PATTERN.test(detail)
    ? new BleBusError(message, err)
    : new BleTransportError(message, err);
}
