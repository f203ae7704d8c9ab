export const PACKET_HEADER = 0x55;

// Command groups: 55 <group> <sub> ...
export enum CommandGroup {
  Power      = 0x01,
  Brightness = 0x03,
  Effect     = 0x04,
  Color      = 0x07,
}

export const BRIGHTNESS_MAX_LEVEL = 0x0f;

export const EFFECT_OFF = 'off';

// Effects are numbered 0-9 on the device
export const EFFECT_MAP: Readonly<Record<string, number>> = Object.freeze(
  Object.fromEntries(Array.from({ length: 10 }, (_, id) => [`Effect ${id}`, id])),
);

export const EFFECT_LIST: readonly string[] = Object.keys(EFFECT_MAP).sort();

export function effectId(name: string): number | undefined {
  return Object.prototype.hasOwnProperty.call(EFFECT_MAP, name) ? EFFECT_MAP[name] : undefined;
}

export enum ColorMode {
  RGB = 'rgb',
}
