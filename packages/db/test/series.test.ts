import { describe, expect, it } from 'vitest';

import { bucketValue, sanitizeTargetName } from '../src/series';

describe('sanitizeTargetName', () => {
  it('replaces every non-alphanumeric character with an underscore', () => {
    expect(sanitizeTargetName('google.com')).toBe('google_com');
    expect(sanitizeTargetName('https://status.example.com/health?x=1')).toBe(
      'https___status_example_com_health_x_1',
    );
    expect(sanitizeTargetName('8.8.8.8')).toBe('8_8_8_8');
  });

  it('keeps already-safe names unchanged', () => {
    expect(sanitizeTargetName('abcXYZ123')).toBe('abcXYZ123');
  });
});

describe('bucketValue', () => {
  it('collapses bucket states into renderable values', () => {
    expect(bucketValue({ kind: 'observed', status: 'Down' })).toBe('Down');
    expect(bucketValue({ kind: 'missing', resolved: 'Up' })).toBe('Up');
    expect(bucketValue({ kind: 'missing', resolved: 'no_data' })).toBe('no_data');
    expect(bucketValue({ kind: 'future' })).toBe('future');
  });
});
