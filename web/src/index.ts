export { OtpField, type OtpFieldProps } from './components/OtpField';
export {
  useOtpField,
  type OtpBoxState,
  type OtpValidator,
  type UseOtpFieldOptions,
} from './hooks/useOtpField';
export {
  createOtpConfig,
  DEFAULT_OTP_CONFIG,
  FIELD_STYLES,
  TYPING_STATES,
  type FieldStyle,
  type OtpFieldConfig,
  type TypingState,
} from './lib/otpConfig';
export {
  boxSpacing,
  characterAt,
  fieldIndices,
  otpLength,
  resolveBoxColor,
  truncateOtp,
  type BoxColorInput,
} from './lib/otp';
export { SHAKE_DURATION_MS, SHAKE_FRAME_MS, SHAKE_OFFSETS } from './lib/constants';
export { triggerErrorHaptic, triggerHaptic } from './lib/haptics';
