/**
 * Runs `fn` and returns the error it throws.
 *
 * Fails the test when nothing (or a non-Error value) is thrown.
 */
export function captureError(fn: () => unknown): Error {
  try {
    fn();
  } catch (error) {
    if (error instanceof Error) return error;
    throw new Error(`Expected an Error, got ${String(error)}`);
  }
  throw new Error('Expected the call to throw');
}
