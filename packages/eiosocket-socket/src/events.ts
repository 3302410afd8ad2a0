/**
 * Passed to `dialError` listeners.
 *
 * `count` is `-1` for an explicit `dial()` and counts up from 1 for the
 * automatic retries of one reconnection chain.
 */
export class DialErrorContext {
  private _reDialCanceled = false;

  constructor(public readonly count: number, public readonly error: Error) {}

  get reDialCanceled() {
    return this._reDialCanceled;
  }

  /** Stops the scheduler from retrying after this failure. */
  cancelReDial() {
    this._reDialCanceled = true;
  }
}
