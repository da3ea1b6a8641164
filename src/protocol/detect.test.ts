import { describe, it, expect } from 'vitest';
import { detectFormat, firstSignificantChar } from './detect.js';

describe('detectFormat', () => {
  it.each([
    ['@to:A @fr:B @t:REQ\nX', 'compact'],
    ['  \n\t@to:A @fr:B @t:REQ\nX', 'compact'],
    ['<message></message>', 'structured'],
    ['\n   <message/>', 'structured'],
    ['', 'unrecognized'],
    ['   \n ', 'unrecognized'],
    ['{"to":"A"}', 'unrecognized'],
    ['hello @to:A', 'unrecognized'],
  ])('classifies %j as %s', (raw, expected) => {
    expect(detectFormat(raw)).toBe(expected);
  });

  it('does not look past the first significant character', () => {
    expect(detectFormat('@ this is not a valid message')).toBe('compact');
    expect(detectFormat('< not markup either')).toBe('structured');
  });
});

describe('firstSignificantChar', () => {
  it('skips leading whitespace', () => {
    expect(firstSignificantChar(' \r\n\t x')).toBe('x');
  });

  it('returns an empty string for blank input', () => {
    expect(firstSignificantChar('  ')).toBe('');
  });
});
