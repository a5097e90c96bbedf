import { describe, it, expect } from 'vitest';
import { colors, contrastText, growthColor, hexToRgba, lighten, relativeLuminance } from '../theme.ts';

describe('Theme', () => {
  it('contrastText picks black on light and white on dark', () => {
    expect(contrastText('#FFFFFF')).toBe('#000000');
    expect(contrastText('#000000')).toBe('#FFFFFF');
    expect(contrastText('#fff')).toBe('#000000');
  });

  it('contrastText falls back to black for malformed colours', () => {
    expect(contrastText('not-a-colour')).toBe('#000000');
  });

  it('relativeLuminance spans 0..1', () => {
    expect(relativeLuminance('#000000')).toBe(0);
    expect(relativeLuminance('#FFFFFF')).toBeCloseTo(1, 10);
    expect(relativeLuminance('#12345')).toBeNull();
  });

  it('lighten raises each channel and caps at 255', () => {
    expect(lighten('#636EFA')).toBe('#8B96FF');
    expect(lighten('#fff')).toBe('#FFFFFF');
    expect(lighten('#000000', 16)).toBe('#101010');
    expect(lighten('zzz')).toBe(colors.grey);
  });

  it('hexToRgba formats with alpha and falls back to blue', () => {
    expect(hexToRgba('#3b82f6', 0.2)).toBe('rgba(59, 130, 246, 0.2)');
    expect(hexToRgba('bad', 0.5)).toBe('rgba(187, 170, 221, 0.5)');
    expect(hexToRgba('zzz', 0.5)).toBe('rgba(59, 130, 246, 0.5)');
    expect(hexToRgba('#12345', 0.5)).toBe('rgba(59, 130, 246, 0.5)');
  });

  it('growthColor returns correct thresholds', () => {
    expect(growthColor(null)).toBe(colors.textMute);
    expect(growthColor(0.06)).toBe(colors.green);
    expect(growthColor(0.03)).toBe(colors.lime);
    expect(growthColor(0)).toBe(colors.amber);
    expect(growthColor(-0.01)).toBe(colors.red);
  });
});
