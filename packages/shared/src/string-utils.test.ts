import {
  formatBytes,
  formatCount,
  formatDuration,
  formatRate,
  formatSigned,
} from './string-utils';

describe('formatBytes', () => {
  it('keeps small values in bytes', () => {
    expect(formatBytes(0)).toBe('0 B');
    expect(formatBytes(1023)).toBe('1023 B');
  });

  it('scales to binary units', () => {
    expect(formatBytes(1536)).toBe('1.50 KiB');
    expect(formatBytes(5 * 1024 ** 3)).toBe('5.00 GiB');
  });
});

describe('number formatting', () => {
  it('groups thousands', () => {
    expect(formatCount(1234567)).toBe('1,234,567');
  });

  it('signs positive differences', () => {
    expect(formatSigned(12)).toBe('+12');
    expect(formatSigned(-3)).toBe('-3');
    expect(formatSigned(0)).toBe('0');
  });

  it('renders durations', () => {
    expect(formatDuration(250)).toBe('250ms');
    expect(formatDuration(2500)).toBe('2.5s');
    expect(formatDuration(125000)).toBe('2m 5s');
  });

  it('renders rates', () => {
    expect(formatRate(3000, 1500)).toBe('2,000/s');
    expect(formatRate(10, 0)).toBe('-');
  });
});
