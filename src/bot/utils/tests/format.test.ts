import { describe, expect, it } from 'vitest';

import { buildCaption, formatBytes, formatProgress } from '../format';

describe('formatBytes', () => {
  it('formats with 1024-based units', () => {
    expect(formatBytes(0)).toBe('0 B');
    expect(formatBytes(512)).toBe('512 B');
    expect(formatBytes(1536)).toBe('1.5 KB');
    expect(formatBytes(12 * 1024 * 1024)).toBe('12.0 MB');
  });
});

describe('buildCaption', () => {
  it('joins name and size label', () => {
    expect(buildCaption({ directUrl: 'https://cdn/x.mp4', displayName: 'clip', sizeLabel: '12 MB' })).toBe('clip (12 MB)');
  });

  it('shortens long names to the caption limit', () => {
    const caption = buildCaption({ directUrl: 'https://cdn/x.mp4', displayName: 'a'.repeat(2000), sizeLabel: '1 GB' });
    expect(caption).toHaveLength(1024);
    expect(caption.endsWith('a… (1 GB)')).toBe(true);
  });
});

describe('formatProgress', () => {
  it('shows percent and sizes when the total is known', () => {
    expect(formatProgress({ downloaded: 5 * 1024 * 1024, total: 12 * 1024 * 1024, percent: 41 })).toBe(
      '41% (5.0 MB / 12.0 MB)'
    );
  });

  it('shows bytes only otherwise', () => {
    expect(formatProgress({ downloaded: 5 * 1024 * 1024, total: null, percent: null })).toBe('5.0 MB');
  });
});
