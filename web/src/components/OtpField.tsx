import {
  memo,
  useEffect,
  useMemo,
  type CSSProperties,
  type FC,
  type MouseEvent,
} from 'react';
import { motion, AnimatePresence, useAnimate, useReducedMotion } from 'framer-motion';
import { useOtpField, type OtpBoxState, type OtpValidator } from '../hooks/useOtpField';
import {
  BOX_TRANSITION_MS,
  ROUNDED_BORDER_WIDTH,
  ROUNDED_BOX_RADIUS,
  SHAKE_DURATION_MS,
  SHAKE_OFFSETS,
  UNDERLINE_HEIGHT,
} from '../lib/constants';
import { triggerErrorHaptic } from '../lib/haptics';
import { boxSpacing } from '../lib/otp';
import { createOtpConfig, type OtpFieldConfig, type TypingState } from '../lib/otpConfig';
import './OtpField.css';

export interface OtpFieldProps {
  /** Current OTP text, owned by the host */
  value: string;
  /** Called with the new (truncated) text */
  onValueChange: (value: string) => void;
  /** Classifies the text after every change */
  validate: OtpValidator;
  /** Overrides merged over the default config */
  config?: Partial<OtpFieldConfig>;
  /** Called when `validate` rejects */
  onValidationError?: (error: unknown, value: string) => void;
  /** Ignore results of superseded validations */
  discardStaleResults?: boolean;
  /** Focus the hidden input on mount */
  autoFocus?: boolean;
  className?: string;
  'aria-label'?: string;
}

interface BoxProps {
  box: OtpBoxState;
  state: TypingState;
  config: OtpFieldConfig;
  reducedMotion: boolean;
}

const charTransition = { duration: BOX_TRANSITION_MS / 1000, ease: 'easeInOut' as const };

const OtpBox = memo<BoxProps>(({ box, state, config, reducedMotion }) => {
  const rounded = config.style === 'roundedBorder';
  const sizeStyle: CSSProperties = {
    width: config.boxWidth ?? undefined,
    height: config.boxHeight ?? undefined,
  };
  const boxStyle: CSSProperties = rounded
    ? {
        ...sizeStyle,
        borderStyle: 'solid',
        borderWidth: ROUNDED_BORDER_WIDTH,
        borderRadius: ROUNDED_BOX_RADIUS,
        borderColor: box.color,
      }
    : sizeStyle;

  const classes = [
    'otp-box',
    box.character !== '' && 'filled',
    box.active && 'active',
    state !== 'typing' && state,
  ].filter(Boolean).join(' ');

  return (
    <div className={classes} style={boxStyle} data-index={box.index} data-state={state}>
      {!rounded && (
        <div
          className="otp-underline"
          style={{ height: UNDERLINE_HEIGHT, backgroundColor: box.color }}
        />
      )}
      <AnimatePresence initial={false} mode="popLayout">
        {box.character !== '' && (
          <motion.span
            key={`${box.index}-${box.character}`}
            className="otp-char"
            style={{ font: config.font }}
            initial={reducedMotion ? { opacity: 0 } : { opacity: 0, filter: 'blur(6px)', scale: 0.8 }}
            animate={{ opacity: 1, filter: 'blur(0px)', scale: 1 }}
            exit={reducedMotion ? { opacity: 0 } : { opacity: 0, filter: 'blur(6px)', scale: 0.8 }}
            transition={charTransition}
          >
            {box.character}
          </motion.span>
        )}
      </AnimatePresence>
    </div>
  );
});
OtpBox.displayName = 'OtpBox';

// Keeps focus in the hidden input while the toolbar button is pressed
const keepFocus = (e: MouseEvent) => e.preventDefault();

/**
 * Segmented OTP input: one box per character over a single hidden native input.
 *
 * - Box colors follow the typing state and focus
 * - Host-supplied async validation after every change
 * - Shake + error haptic on each invalid result
 * - Tap anywhere on the boxes to focus
 * - "Done" accessory while focused
 */
export const OtpField: FC<OtpFieldProps> = ({
  value,
  onValueChange,
  validate,
  config: overrides,
  onValidationError,
  discardStaleResults,
  autoFocus = false,
  className = '',
  'aria-label': ariaLabel = 'Verification code',
}) => {
  const config = useMemo(() => createOtpConfig(overrides), [overrides]);
  const reducedMotion = useReducedMotion() ?? false;
  const [scope, animate] = useAnimate<HTMLDivElement>();

  const field = useOtpField({
    value,
    onValueChange,
    validate,
    config,
    onValidationError,
    discardStaleResults,
  });
  const { invalidTrigger, requestFocus } = field;

  useEffect(() => {
    if (autoFocus) requestFocus();
  }, [autoFocus, requestFocus]);

  // One shake and one error pulse per invalid result
  useEffect(() => {
    if (invalidTrigger === 0) return;
    triggerErrorHaptic();
    const controls = animate(
      scope.current,
      { x: [...SHAKE_OFFSETS] },
      { duration: SHAKE_DURATION_MS / 1000, ease: 'linear' },
    );
    return () => controls.stop();
  }, [invalidTrigger, animate, scope]);

  const fieldCount = Math.max(0, config.numberOfFields);

  return (
    <div className={`otp-field otp-${config.style} ${className}`.trim()}>
      <div
        className="otp-field-body"
        role="group"
        aria-label={ariaLabel}
        data-state={field.state}
        onClick={requestFocus}
      >
        <input
          ref={field.inputRef}
          className="otp-hidden-input"
          type="text"
          inputMode="numeric"
          autoComplete="one-time-code"
          value={value}
          onChange={(e) => field.handleInput(e.target.value)}
          onFocus={field.handleFocus}
          onBlur={field.handleBlur}
          aria-label={`${fieldCount}-character verification code`}
          aria-invalid={field.state === 'invalid'}
        />

        <div ref={scope} className="otp-boxes" style={{ gap: boxSpacing(config.style) }}>
          {field.boxes.map((box) => (
            <OtpBox
              key={box.index}
              box={box}
              state={field.state}
              config={config}
              reducedMotion={reducedMotion}
            />
          ))}
        </div>
      </div>

      {field.focused && (
        <motion.div
          className="otp-toolbar"
          role="toolbar"
          aria-label="Keyboard accessory"
          initial={{ opacity: 0, y: 4 }}
          animate={{ opacity: 1, y: 0 }}
          transition={{ duration: 0.15 }}
        >
          <button
            type="button"
            className="otp-done"
            onMouseDown={keepFocus}
            onClick={field.resignFocus}
          >
            Done
          </button>
        </motion.div>
      )}
    </div>
  );
};

export default OtpField;
