import { BRIGHTNESS_MAX_LEVEL, CommandGroup, PACKET_HEADER } from './constants';

export type Rgb = readonly [number, number, number];

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, Math.round(value)));
}

function packet(...bytes: number[]): Buffer {
  return Buffer.from([PACKET_HEADER, ...bytes]);
}

// 55 01 02 <on>
export function setPower(on: boolean): Buffer {
  return packet(CommandGroup.Power, 0x02, on ? 0x01 : 0x00);
}

// 55 07 01 R G B
export function setColor([r, g, b]: Rgb): Buffer {
  return packet(CommandGroup.Color, 0x01, clamp(r, 0, 255), clamp(g, 0, 255), clamp(b, 0, 255));
}

// Device only has 16 levels: 0-255 scaled by 0.06, capped at 0x0F
export function brightnessLevel(brightness: number): number {
  const value = clamp(brightness, 0, 255);
  return Math.min(Math.floor((value * 6) / 100), BRIGHTNESS_MAX_LEVEL);
}

// 55 03 01 FF <level>
export function setBrightness(brightness: number): Buffer {
  return packet(CommandGroup.Brightness, 0x01, 0xff, brightnessLevel(brightness));
}

// 55 04 01 <effectId>
export function setEffect(effectId: number): Buffer {
  return packet(CommandGroup.Effect, 0x01, clamp(effectId, 0, 9));
}

// Percent 0-100 scaled by 2.55 into a byte
export function effectSpeedByte(speed: number): number {
  return clamp((clamp(speed, 0, 100) * 255) / 100, 0, 255);
}

// 55 04 04 <speed>
export function setEffectSpeed(speed: number): Buffer {
  return packet(CommandGroup.Effect, 0x04, effectSpeedByte(speed));
}
