import type { Rgb } from './protocol/commands';

// HomeKit sends hue (0-360) and saturation (0-100) separately; brightness
// travels on its own packet, so colors are converted at full value.
export function hsToRgb(hue: number, saturation: number): Rgb {
  const h = ((hue % 360) + 360) % 360 / 60;
  const s = Math.max(0, Math.min(100, saturation)) / 100;
  const c = s;
  const x = c * (1 - Math.abs((h % 2) - 1));
  const m = 1 - c;

  let rgb: [number, number, number];
  if (h < 1) {
    rgb = [c, x, 0];
  } else if (h < 2) {
    rgb = [x, c, 0];
  } else if (h < 3) {
    rgb = [0, c, x];
  } else if (h < 4) {
    rgb = [0, x, c];
  } else if (h < 5) {
    rgb = [x, 0, c];
  } else {
    rgb = [c, 0, x];
  }
  return [
    Math.round((rgb[0] + m) * 255),
    Math.round((rgb[1] + m) * 255),
    Math.round((rgb[2] + m) * 255),
  ];
}

export function rgbToHs([r, g, b]: Rgb): { hue: number; saturation: number } {
  const max = Math.max(r, g, b);
  const min = Math.min(r, g, b);
  const delta = max - min;
  if (max === 0 || delta === 0) {
    return { hue: 0, saturation: 0 };
  }

  let hue: number;
  if (max === r) {
    hue = 60 * (((g - b) / delta) % 6);
  } else if (max === g) {
    hue = 60 * ((b - r) / delta + 2);
  } else {
    hue = 60 * ((r - g) / delta + 4);
  }
  if (hue < 0) {
    hue += 360;
  }
  return { hue: Math.round(hue), saturation: Math.round((delta / max) * 100) };
}

export function percentToLevel(percent: number): number {
  return Math.round((Math.max(0, Math.min(100, percent)) * 255) / 100);
}

export function levelToPercent(level: number): number {
  return Math.round((Math.max(0, Math.min(255, level)) * 100) / 255);
}
