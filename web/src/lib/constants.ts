// Field defaults
export const DEFAULT_NUMBER_OF_FIELDS = 6;
export const DEFAULT_BOX_SIZE = 50;

// Box layout (px)
export const ROUNDED_BOX_SPACING = 6;
export const UNDERLINED_BOX_SPACING = 10;
export const ROUNDED_BOX_RADIUS = 10;
export const ROUNDED_BORDER_WIDTH = 1.2;
export const UNDERLINE_HEIGHT = 1;

// Value and focus changes ease in and out over this duration
export const BOX_TRANSITION_MS = 250;

// Invalid-entry shake: x offsets (px), one linear frame each
export const SHAKE_OFFSETS = [0, 10, -10, 10, -5, 5, 0] as const;
export const SHAKE_FRAME_MS = 60;
export const SHAKE_DURATION_MS = (SHAKE_OFFSETS.length - 1) * SHAKE_FRAME_MS;

// Vibration pattern for the error pulse
export const ERROR_HAPTIC_PATTERN = [20, 40, 20, 40, 20];

// Log prefix
export const LOG_SCOPE = '[OtpField]';
