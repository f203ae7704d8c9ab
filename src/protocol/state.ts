import type { Rgb } from './commands';
import { ColorMode, EFFECT_OFF } from './constants';

/**
 * Last command issued successfully to the strip.
 *
 * The controller never reports its state back, so these values are optimistic:
 * they change right after an acknowledged write and are never re-read.
 */
export interface LightState {
  on: boolean;
  rgb: Rgb;
  brightness: number;     // 0-255
  effect: string;         // effect name or EFFECT_OFF
  colorMode: ColorMode;
}

export function createDefaultState(): LightState {
  return {
    on: false,
    rgb: [255, 255, 255],
    brightness: 255,
    effect: EFFECT_OFF,
    colorMode: ColorMode.RGB,
  };
}

export interface DeviceInfo {
  manufacturer?: string;
  model?: string;
  firmwareRevision?: string;
}
