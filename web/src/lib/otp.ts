import { ROUNDED_BOX_SPACING, UNDERLINED_BOX_SPACING } from './constants';
import type { FieldStyle, OtpFieldConfig, TypingState } from './otpConfig';

/**
 * OTP string helpers.
 *
 * Characters are counted by code point, so an emoji or other astral
 * character occupies one box rather than two.
 */

export function otpLength(value: string): number {
  return Array.from(value).length;
}

/** Keep at most `numberOfFields` characters; non-positive counts give '' */
export function truncateOtp(value: string, numberOfFields: number): string {
  if (numberOfFields <= 0) return '';
  const chars = Array.from(value);
  if (chars.length <= numberOfFields) return value;
  return chars.slice(0, numberOfFields).join('');
}

/** Character shown in box `index`, or '' when the value is shorter */
export function characterAt(value: string, index: number): string {
  if (index < 0) return '';
  return Array.from(value)[index] ?? '';
}

/** Box indices 0..n-1 */
export function fieldIndices(numberOfFields: number): number[] {
  return Array.from({ length: Math.max(0, Math.floor(numberOfFields)) }, (_, i) => i);
}

export function boxSpacing(style: FieldStyle): number {
  return style === 'roundedBorder' ? ROUNDED_BOX_SPACING : UNDERLINED_BOX_SPACING;
}

export interface BoxColorInput {
  state: TypingState;
  /** Current value length */
  length: number;
  focused: boolean;
}

/**
 * Border/underline color of box `index`.
 *
 * A validation verdict colors every box; while typing only the box awaiting
 * the next character is highlighted, and only when the field has focus.
 */
export function resolveBoxColor(
  index: number,
  { state, length, focused }: BoxColorInput,
  config: OtpFieldConfig,
): string {
  switch (state) {
    case 'valid':
      return config.validColor;
    case 'invalid':
      return config.invalidColor;
    case 'typing':
      return index === length && focused ? config.activeColor : config.inactiveColor;
  }
}
