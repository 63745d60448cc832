/**
 * Irreversible unset -> set transition.
 *
 * JavaScript runs each callback to completion, so the read and the write in
 * trySet() cannot interleave with another caller: this is a test-and-set
 * without a lock, shared safely between the execute() path and any
 * completion or cancellation callbacks.
 */
export class OneShotFlag {
  private set = false;

  get isSet(): boolean {
    return this.set;
  }

  /**
   * Returns true for the caller that performed the transition, false for every later one.
   */
  trySet(): boolean {
    if (this.set) {
      return false;
    }
    this.set = true;
    return true;
  }
}
