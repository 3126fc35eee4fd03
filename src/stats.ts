import type {CleanupReason} from './cleanup';

export class GeneratorStats {
  resumes = 0;
  yields = 0;
  jumps = 0;

  toString(): string {
    /* eslint-disable max-len */
    return `${this.resumes.toLocaleString()} resumes, ${this.yields.toLocaleString()} yields, ${this.jumps.toLocaleString()} jumps`;
    /* eslint-enable max-len */
  }
}

export class FactoryStats {
  created = 0;
  disposed = 0;
  finalized = 0;
  private _maxLive = 0;

  constructor(readonly name: string) {}

  /** Number of generators created but not yet torn down. */
  get live(): number {
    return this.created - this.disposed - this.finalized;
  }

  get maxLive(): number {
    return this._maxLive;
  }

  recordCreated(): void {
    this.created += 1;
    if (this.live > this._maxLive) this._maxLive = this.live;
  }

  recordTeardown(reason: CleanupReason): void {
    if (reason === 'dispose') {
      this.disposed += 1;
    } else {
      this.finalized += 1;
    }
  }

  toString(): string {
    /* eslint-disable max-len */
    return `${this.live.toLocaleString()} live of ${this.created.toLocaleString()} created, ${this.maxLive.toLocaleString()} peak (${this.disposed.toLocaleString()} disposed, ${this.finalized.toLocaleString()} finalized)`;
    /* eslint-enable max-len */
  }
}
