import { describe, expect, it } from 'vitest';
import * as commands from './commands';
import { EFFECT_LIST, EFFECT_MAP, effectId } from './constants';

const hex = (data: Buffer) => data.toString('hex');

describe('commands', () => {
  it('encodes power', () => {
    expect(hex(commands.setPower(true))).toBe('55010201');
    expect(hex(commands.setPower(false))).toBe('55010200');
  });

  it('encodes color and clamps components', () => {
    expect(hex(commands.setColor([10, 20, 30]))).toBe('5507010a141e');
    expect(hex(commands.setColor([-5, 300, 127.6]))).toBe('55070100ff80');
  });

  describe('brightness', () => {
    it('maps 0-255 onto 16 device levels', () => {
      expect(commands.brightnessLevel(0)).toBe(0);
      expect(commands.brightnessLevel(16)).toBe(0);
      expect(commands.brightnessLevel(17)).toBe(1);
      expect(commands.brightnessLevel(200)).toBe(12);
      expect(commands.brightnessLevel(249)).toBe(14);
      expect(commands.brightnessLevel(250)).toBe(15);
      expect(commands.brightnessLevel(255)).toBe(15);
    });

    it('never decreases as brightness grows', () => {
      let previous = -1;
      for (let b = 0; b <= 255; b++) {
        const level = commands.brightnessLevel(b);
        expect(level).toBe(Math.min(Math.floor((b * 6) / 100), 15));
        expect(level).toBeGreaterThanOrEqual(previous);
        previous = level;
      }
    });

    it('encodes the packet', () => {
      expect(hex(commands.setBrightness(200))).toBe('550301ff0c');
      expect(hex(commands.setBrightness(999))).toBe('550301ff0f');
    });
  });

  describe('effect speed', () => {
    it('scales percent into a byte', () => {
      expect(commands.effectSpeedByte(0)).toBe(0);
      expect(commands.effectSpeedByte(1)).toBe(3);
      expect(commands.effectSpeedByte(50)).toBe(128);
      expect(commands.effectSpeedByte(100)).toBe(255);
      expect(commands.effectSpeedByte(150)).toBe(255);
      expect(commands.effectSpeedByte(-10)).toBe(0);
    });

    it('never decreases as speed grows', () => {
      let previous = -1;
      for (let s = 0; s <= 100; s++) {
        const value = commands.effectSpeedByte(s);
        expect(value).toBe(Math.min(Math.max(Math.round((s * 255) / 100), 0), 255));
        expect(value).toBeGreaterThanOrEqual(previous);
        previous = value;
      }
    });

    it('encodes the packet', () => {
      expect(hex(commands.setEffectSpeed(50))).toBe('55040480');
    });
  });

  describe('effects', () => {
    it('encodes the effect id', () => {
      expect(hex(commands.setEffect(3))).toBe('55040103');
      expect(hex(commands.setEffect(9))).toBe('55040109');
    });

    it('knows exactly ten effects', () => {
      expect(EFFECT_LIST).toHaveLength(10);
      expect(EFFECT_LIST[0]).toBe('Effect 0');
      expect(EFFECT_LIST[9]).toBe('Effect 9');
      expect(EFFECT_MAP['Effect 4']).toBe(4);
    });

    it('looks up ids by name only', () => {
      expect(effectId('Effect 0')).toBe(0);
      expect(effectId('Effect 10')).toBeUndefined();
      expect(effectId('toString')).toBeUndefined();
    });
  });
});
