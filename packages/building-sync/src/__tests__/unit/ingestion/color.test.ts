import { describe, expect, it } from 'vitest';
import { parseHexColor, rgbToHex } from '../../../ingestion/color.js';

describe('parseHexColor', () => {
  it('should parse six digit colors with or without a hash', () => {
    expect(parseHexColor('#FF8000')).toEqual({ hex: '#ff8000', rgb: { r: 255, g: 128, b: 0 } });
    expect(parseHexColor('  00ff00 ')).toEqual({ hex: '#00ff00', rgb: { r: 0, g: 255, b: 0 } });
  });

  it('should reject shorthand, malformed and non-string values', () => {
    expect(parseHexColor('#fff')).toBeNull();
    expect(parseHexColor('#gg0000')).toBeNull();
    expect(parseHexColor('#ff00001')).toBeNull();
    expect(parseHexColor(0xff0000)).toBeNull();
    expect(parseHexColor(null)).toBeNull();
  });
});

describe('rgbToHex', () => {
  it('should clamp and pad channels', () => {
    expect(rgbToHex({ r: 255, g: 0, b: 10 })).toBe('#ff000a');
    expect(rgbToHex({ r: 300, g: -5, b: 127.6 })).toBe('#ff0080');
  });
});
