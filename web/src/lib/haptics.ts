import { ERROR_HAPTIC_PATTERN } from './constants';

/**
 * Vibrate on devices that support it.
 * Returns true when a pulse was requested.
 */
export function triggerHaptic(pattern: number | number[] = 10): boolean {
  if (typeof navigator === 'undefined' || typeof navigator.vibrate !== 'function') {
    return false;
  }
  try {
    return navigator.vibrate(pattern);
  } catch {
    // Some browsers throw outside a user gesture
    return false;
  }
}

export function triggerErrorHaptic(): boolean {
  return triggerHaptic(ERROR_HAPTIC_PATTERN);
}
