import { otpLength } from './otp';
import type { TypingState } from './otpConfig';

export interface DemoValidatorOptions {
  /** Code the demo accepts */
  expectedCode: string;
  numberOfFields: number;
  /** Simulated round-trip to a verification backend */
  delayMs?: number;
}

const wait = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Stand-in for a host's verification call: stays in `typing` until every box
 * is filled, then answers after a short delay.
 */
export function createDemoValidator({
  expectedCode,
  numberOfFields,
  delayMs = 600,
}: DemoValidatorOptions): (value: string) => Promise<TypingState> {
  return async (value) => {
    if (otpLength(value) < numberOfFields) return 'typing';
    await wait(delayMs);
    return value === expectedCode ? 'valid' : 'invalid';
  };
}
