import { describe, it, expect } from 'vitest';
import { parseHexColor, renderSettings, RENDER_DEFAULTS } from '../../src/config.js';

describe('parseHexColor', () => {
  it('parses #RRGGBB', () => {
    expect(parseHexColor('#141428')).toEqual([20, 20, 40]);
    expect(parseHexColor('#00FFff')).toEqual([0, 255, 255]);
  });

  it('rejects other notations', () => {
    expect(() => parseHexColor('141428')).toThrow(/Invalid hex color/);
    expect(() => parseHexColor('#fff')).toThrow(/Invalid hex color/);
  });
});

describe('renderSettings', () => {
  it('overrides individual defaults', () => {
    const settings = renderSettings({ fps: 24, crf: 18 });
    expect(settings.fps).toBe(24);
    expect(settings.crf).toBe(18);
    expect(settings.videoCodec).toBe(RENDER_DEFAULTS.videoCodec);
  });

  it('does not change the shared defaults', () => {
    const before = { ...RENDER_DEFAULTS };
    renderSettings({ width: 720 });
    expect(RENDER_DEFAULTS).toEqual(before);
  });
});
