/**
 * Runs a compensating action when the guarded block is left, unless the
 * block dismissed the guard on its success path.
 *
 * @example
 * ```ts
 * const guard = new ScopeGuard(() => rollback());
 * try {
 *   doSteps();
 *   guard.dismiss();
 * } finally {
 *   guard.close();
 * }
 * ```
 */
export class ScopeGuard {
  private action: (() => void) | null;

  constructor(action: () => void) {
    this.action = action;
  }

  dismiss(): void {
    this.action = null;
  }

  /** Fire the action if still armed. Safe to call more than once. */
  close(): void {
    const action = this.action;
    this.action = null;
    if (action) action();
  }
}
