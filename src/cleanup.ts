import {CheckError} from './errors';

export type CleanupReason = 'dispose' | 'finalize';
export type CleanupListener = (reason: CleanupReason) => void;


const finalizer = new FinalizationRegistry<CleanupRegistry>(registry => {
  registry.finalize();
});


/**
 * Holds the (at most one) cleanup action of a generator and guarantees that it runs at most once,
 * no matter how many times or by whom teardown is triggered.
 */
export class CleanupRegistry {
  private action?: () => void;
  private attached = false;
  private _fired = false;

  constructor(private readonly listener?: CleanupListener) {}

  get fired(): boolean {
    return this._fired;
  }

  get registered(): boolean {
    return !!this.action;
  }

  register(action: () => void): void {
    if (this.action) throw new CheckError('A cleanup action is already registered');
    if (this._fired) throw new CheckError('Cannot register a cleanup action after teardown');
    this.action = action;
  }

  /**
   * Fires the cleanup action if it's not yet been run by the time the owner gets garbage collected.
   * The owner must not be reachable from the action.
   */
  attach(owner: object): void {
    if (this.attached || this._fired) return;
    finalizer.register(owner, this, this);
    this.attached = true;
  }

  /**
   * Runs the cleanup action unless the registry already fired.  The registry counts as fired even
   * if the action throws; the error is passed on to the caller.
   * @returns Whether this call performed the teardown.
   */
  fire(reason: CleanupReason): boolean {
    if (this._fired) return false;
    this._fired = true;
    if (this.attached) {
      finalizer.unregister(this);
      this.attached = false;
    }
    const action = this.action;
    this.action = undefined;
    try {
      action?.();
    } finally {
      this.listener?.(reason);
    }
    return true;
  }

  /**
   * Fires the registry on behalf of the garbage collector.  There's no caller to hand an error from
   * the cleanup action to, so it gets logged instead.
   */
  finalize(): void {
    try {
      this.fire('finalize');
    } catch (e) {
      console.error('Cleanup action failed during finalization:', e);
    }
  }
}
