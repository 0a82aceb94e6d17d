import { describe, it, expect } from 'vitest';
import {
  boxSpacing,
  characterAt,
  fieldIndices,
  otpLength,
  resolveBoxColor,
  truncateOtp,
} from './otp';
import { createOtpConfig } from './otpConfig';

const config = createOtpConfig({
  numberOfFields: 6,
  inactiveColor: 'gray',
  activeColor: 'blue',
  validColor: 'green',
  invalidColor: 'red',
});

describe('truncateOtp', () => {
  it('keeps the first numberOfFields characters', () => {
    expect(truncateOtp('12345678', 6)).toBe('123456');
  });

  it('returns short values unchanged', () => {
    expect(truncateOtp('1234', 6)).toBe('1234');
    expect(truncateOtp('', 6)).toBe('');
  });

  it('returns empty string for non-positive counts', () => {
    expect(truncateOtp('123', 0)).toBe('');
    expect(truncateOtp('123', -2)).toBe('');
  });

  it('counts astral characters once', () => {
    expect(truncateOtp('a😀bc', 2)).toBe('a😀');
  });
});

describe('otpLength', () => {
  it('counts code points', () => {
    expect(otpLength('1234')).toBe(4);
    expect(otpLength('😀1')).toBe(2);
  });
});

describe('characterAt', () => {
  it('returns the character at the index', () => {
    expect(characterAt('583', 0)).toBe('5');
    expect(characterAt('583', 2)).toBe('3');
  });

  it('returns empty string past the end', () => {
    expect(characterAt('583', 3)).toBe('');
    expect(characterAt('', 0)).toBe('');
  });

  it('returns empty string for negative indices', () => {
    expect(characterAt('583', -1)).toBe('');
  });
});

describe('fieldIndices', () => {
  it('lists one index per box', () => {
    expect(fieldIndices(4)).toEqual([0, 1, 2, 3]);
  });

  it('is empty for non-positive counts', () => {
    expect(fieldIndices(0)).toEqual([]);
    expect(fieldIndices(-3)).toEqual([]);
  });
});

describe('boxSpacing', () => {
  it('uses tighter spacing for rounded boxes', () => {
    expect(boxSpacing('roundedBorder')).toBe(6);
    expect(boxSpacing('underlined')).toBe(10);
  });
});

describe('resolveBoxColor', () => {
  const indices = [0, 1, 2, 3, 4, 5];

  it('colors every box valid regardless of focus or index', () => {
    for (const focused of [true, false]) {
      const colors = indices.map((i) => resolveBoxColor(i, { state: 'valid', length: 6, focused }, config));
      expect(colors).toEqual(Array(6).fill('green'));
    }
  });

  it('colors every box invalid regardless of focus or index', () => {
    for (const focused of [true, false]) {
      const colors = indices.map((i) => resolveBoxColor(i, { state: 'invalid', length: 2, focused }, config));
      expect(colors).toEqual(Array(6).fill('red'));
    }
  });

  it('highlights the box at the current length while focused', () => {
    const colors = indices.map((i) => resolveBoxColor(i, { state: 'typing', length: 5, focused: true }, config));
    expect(colors).toEqual(['gray', 'gray', 'gray', 'gray', 'gray', 'blue']);
  });

  it('highlights nothing while unfocused', () => {
    const colors = indices.map((i) => resolveBoxColor(i, { state: 'typing', length: 5, focused: false }, config));
    expect(colors).toEqual(Array(6).fill('gray'));
  });

  it('highlights nothing once every box is filled', () => {
    const colors = indices.map((i) => resolveBoxColor(i, { state: 'typing', length: 6, focused: true }, config));
    expect(colors).toEqual(Array(6).fill('gray'));
  });
});
