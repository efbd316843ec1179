import { errorMessage } from '../agent/errors.js';

/**
 * Cooperative cancellation primitive.
 * Passed to a session; checked between rounds.
 */
export class CancelToken {
  private _canceled = false;
  private _reason = 'Session cancelled';
  private _listeners: Array<() => void> = [];

  get canceled(): boolean {
    return this._canceled;
  }

  get reason(): string {
    return this._reason;
  }

  cancel(reason?: string): void {
    if (this._canceled) return;
    this._canceled = true;
    if (reason) this._reason = reason;
    for (const fn of this._listeners) {
      this.invoke(fn);
    }
    this._listeners.length = 0;
  }

  onCancel(fn: () => void): void {
    if (this._canceled) {
      this.invoke(fn);
      return;
    }
    this._listeners.push(fn);
  }

  private invoke(fn: () => void): void {
    try {
      fn();
    } catch (err) {
      console.log(`[Session] cancel listener failed: ${errorMessage(err)}`);
    }
  }
}
