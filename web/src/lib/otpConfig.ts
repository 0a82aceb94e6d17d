import { DEFAULT_BOX_SIZE, DEFAULT_NUMBER_OF_FIELDS } from './constants';

/** Visual variant of each character box */
export type FieldStyle = 'roundedBorder' | 'underlined';

/** Validity of the current input, as reported by the host's validator */
export type TypingState = 'typing' | 'valid' | 'invalid';

/** Every style with a human-readable label, e.g. for a style picker */
export const FIELD_STYLES: ReadonlyArray<{ id: FieldStyle; label: string }> = [
  { id: 'roundedBorder', label: 'Rounded Border' },
  { id: 'underlined', label: 'Underlined' },
];

export const TYPING_STATES: readonly TypingState[] = ['typing', 'valid', 'invalid'];

/**
 * Display parameters for an OTP field.
 *
 * Colors are any CSS color and `font` is a CSS font shorthand. A `null` box
 * dimension lets the box size itself from its content and the layout.
 * Nothing here is validated: a non-positive `numberOfFields` simply renders
 * no boxes.
 */
export interface OtpFieldConfig {
  /** Number of character boxes */
  readonly numberOfFields: number;
  readonly style: FieldStyle;
  /** Box width in px, or null for automatic sizing */
  readonly boxWidth: number | null;
  /** Box height in px, or null for automatic sizing */
  readonly boxHeight: number | null;
  /** Border/underline color of boxes that are not the active one */
  readonly inactiveColor: string;
  /** Border/underline color of the box awaiting the next character */
  readonly activeColor: string;
  readonly validColor: string;
  readonly invalidColor: string;
  readonly font: string;
}

export const DEFAULT_OTP_CONFIG: OtpFieldConfig = Object.freeze({
  numberOfFields: DEFAULT_NUMBER_OF_FIELDS,
  style: 'roundedBorder',
  boxWidth: DEFAULT_BOX_SIZE,
  boxHeight: DEFAULT_BOX_SIZE,
  inactiveColor: 'gray',
  activeColor: 'currentColor',
  validColor: 'green',
  invalidColor: 'red',
  font: '500 22px system-ui, sans-serif',
});

/**
 * Build a config from the defaults plus any overrides.
 * An override left `undefined` keeps its default; `null` box dimensions are kept.
 */
export function createOtpConfig(overrides: Partial<OtpFieldConfig> = {}): OtpFieldConfig {
  const d = DEFAULT_OTP_CONFIG;
  return Object.freeze({
    numberOfFields: overrides.numberOfFields ?? d.numberOfFields,
    style: overrides.style ?? d.style,
    boxWidth: overrides.boxWidth === undefined ? d.boxWidth : overrides.boxWidth,
    boxHeight: overrides.boxHeight === undefined ? d.boxHeight : overrides.boxHeight,
    inactiveColor: overrides.inactiveColor ?? d.inactiveColor,
    activeColor: overrides.activeColor ?? d.activeColor,
    validColor: overrides.validColor ?? d.validColor,
    invalidColor: overrides.invalidColor ?? d.invalidColor,
    font: overrides.font ?? d.font,
  });
}
