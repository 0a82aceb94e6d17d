import { useCallback, useEffect, useMemo, useRef, useState } from 'react';
import { LOG_SCOPE } from '../lib/constants';
import { characterAt, fieldIndices, otpLength, resolveBoxColor, truncateOtp } from '../lib/otp';
import type { OtpFieldConfig, TypingState } from '../lib/otpConfig';

export type OtpValidator = (value: string) => Promise<TypingState>;

export interface UseOtpFieldOptions {
  /** Current OTP text, owned by the host */
  value: string;
  /** Write side of the host's value */
  onValueChange: (value: string) => void;
  /** Classifies the current text; called on every change */
  validate: OtpValidator;
  config: OtpFieldConfig;
  /** Called when `validate` rejects. State is left as it was. */
  onValidationError?: (error: unknown, value: string) => void;
  /**
   * Ignore results of validations that were superseded by a newer one.
   * Off by default: overlapping validations all apply, last settled wins.
   */
  discardStaleResults?: boolean;
}

export interface OtpBoxState {
  index: number;
  character: string;
  color: string;
  /** Box awaiting the next character while the field has focus */
  active: boolean;
}

/**
 * State behind an OTP field: typing state, focus, shake trigger and the
 * per-box view model.
 *
 * Every change of `value` after mount is truncated to the field count
 * (written back through `onValueChange` when needed) and handed to
 * `validate` on a later microtask, so rendering never waits on it.
 */
export function useOtpField({
  value,
  onValueChange,
  validate,
  config,
  onValidationError,
  discardStaleResults = false,
}: UseOtpFieldOptions) {
  const { numberOfFields } = config;
  const [state, setState] = useState<TypingState>('typing');
  const [invalidTrigger, setInvalidTrigger] = useState(0);
  const [focused, setFocused] = useState(false);
  const inputRef = useRef<HTMLInputElement>(null);

  const prevValueRef = useRef(value);
  const requestIdRef = useRef(0);
  const mountedRef = useRef(false);

  // Latest callbacks, so the value effect only depends on the value
  const callbacksRef = useRef({ onValueChange, validate, onValidationError, discardStaleResults });
  callbacksRef.current = { onValueChange, validate, onValidationError, discardStaleResults };

  useEffect(() => {
    mountedRef.current = true;
    return () => {
      mountedRef.current = false;
    };
  }, []);

  useEffect(() => {
    if (value === prevValueRef.current) return;

    const limited = truncateOtp(value, numberOfFields);
    prevValueRef.current = limited;
    if (limited !== value) {
      callbacksRef.current.onValueChange(limited);
    }

    const requestId = ++requestIdRef.current;
    const isStale = () =>
      callbacksRef.current.discardStaleResults && requestId !== requestIdRef.current;
    Promise.resolve()
      .then(() => callbacksRef.current.validate(limited))
      .then((result) => {
        if (!mountedRef.current) return;
        if (isStale()) return;
        setState(result);
        if (result === 'invalid') {
          setInvalidTrigger((n) => n + 1);
        }
      })
      .catch((error: unknown) => {
        if (isStale()) return;
        console.error(`${LOG_SCOPE} Validation failed for a ${otpLength(limited)}-character value:`, error);
        callbacksRef.current.onValidationError?.(error, limited);
      });
  }, [value, numberOfFields]);

  const handleInput = useCallback((raw: string) => {
    callbacksRef.current.onValueChange(truncateOtp(raw, numberOfFields));
  }, [numberOfFields]);

  const handleFocus = useCallback(() => setFocused(true), []);
  const handleBlur = useCallback(() => setFocused(false), []);

  const requestFocus = useCallback(() => {
    const input = inputRef.current;
    if (!input || document.activeElement === input) return;
    input.focus();
    setFocused(document.activeElement === input);
  }, []);

  const resignFocus = useCallback(() => {
    inputRef.current?.blur();
    setFocused(false);
  }, []);

  const length = otpLength(value);
  const activeIndex = length < numberOfFields ? length : -1;

  const boxes = useMemo<OtpBoxState[]>(
    () =>
      fieldIndices(numberOfFields).map((index) => ({
        index,
        character: characterAt(value, index),
        color: resolveBoxColor(index, { state, length, focused }, config),
        active: state === 'typing' && focused && index === activeIndex,
      })),
    [numberOfFields, value, state, length, focused, config, activeIndex],
  );

  return {
    state,
    invalidTrigger,
    focused,
    inputRef,
    length,
    activeIndex,
    boxes,
    handleInput,
    handleFocus,
    handleBlur,
    requestFocus,
    resignFocus,
  } as const;
}
