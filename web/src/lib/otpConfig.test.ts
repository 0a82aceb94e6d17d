import { describe, it, expect } from 'vitest';
import { createOtpConfig, DEFAULT_OTP_CONFIG, FIELD_STYLES, TYPING_STATES } from './otpConfig';

describe('createOtpConfig', () => {
  it('returns the defaults when called without overrides', () => {
    expect(createOtpConfig()).toEqual({
      numberOfFields: 6,
      style: 'roundedBorder',
      boxWidth: 50,
      boxHeight: 50,
      inactiveColor: 'gray',
      activeColor: 'currentColor',
      validColor: 'green',
      invalidColor: 'red',
      font: '500 22px system-ui, sans-serif',
    });
  });

  it('applies overrides and keeps the other defaults', () => {
    const config = createOtpConfig({ numberOfFields: 4, style: 'underlined', validColor: 'teal' });
    expect(config.numberOfFields).toBe(4);
    expect(config.style).toBe('underlined');
    expect(config.validColor).toBe('teal');
    expect(config.invalidColor).toBe('red');
    expect(config.boxWidth).toBe(50);
  });

  it('keeps null box dimensions for automatic sizing', () => {
    const config = createOtpConfig({ boxWidth: null, boxHeight: null });
    expect(config.boxWidth).toBeNull();
    expect(config.boxHeight).toBeNull();
  });

  it('treats undefined overrides as absent', () => {
    const config = createOtpConfig({ boxWidth: undefined, font: undefined });
    expect(config.boxWidth).toBe(50);
    expect(config.font).toBe(DEFAULT_OTP_CONFIG.font);
  });

  it('does not reject non-positive field counts', () => {
    expect(createOtpConfig({ numberOfFields: 0 }).numberOfFields).toBe(0);
    expect(createOtpConfig({ numberOfFields: -1 }).numberOfFields).toBe(-1);
  });

  it('returns a frozen object', () => {
    expect(Object.isFrozen(createOtpConfig())).toBe(true);
    expect(Object.isFrozen(DEFAULT_OTP_CONFIG)).toBe(true);
  });
});

describe('FIELD_STYLES', () => {
  it('lists both styles with labels', () => {
    expect(FIELD_STYLES).toEqual([
      { id: 'roundedBorder', label: 'Rounded Border' },
      { id: 'underlined', label: 'Underlined' },
    ]);
  });
});

describe('TYPING_STATES', () => {
  it('lists the three states', () => {
    expect(TYPING_STATES).toEqual(['typing', 'valid', 'invalid']);
  });
});
