import { CancelledError } from './errors.js';

/**
 * Throw when the caller's signal has fired. Polled at component boundaries
 * and after every provider call.
 */
export function throwIfCancelled(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    const reason = signal.reason;
    throw new CancelledError(
      reason instanceof Error ? reason.message : typeof reason === 'string' ? reason : 'Operation cancelled'
    );
  }
}
