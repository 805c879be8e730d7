export type BackoffOptions = {
  /** First delay in milliseconds */
  base?: number;
  /** Added to the delay after every failed attempt */
  increment?: number;
  max?: number;
};

/** Linear reconnect delay: base, base + increment, ... until reset */
export class ReconnectBackoff {
  readonly base: number;
  readonly increment: number;
  readonly max: number;

  #current: number;

  constructor({ base = 5_000, increment = 5_000, max = Infinity }: BackoffOptions = {}) {
    this.base = Math.min(base, max);
    this.increment = increment;
    this.max = max;
    this.#current = this.base;
  }

  get current() {
    return this.#current;
  }

  /** Delay to wait before the next attempt */
  next() {
    const delay = this.#current;
    this.#current = Math.min(this.#current + this.increment, this.max);
    return delay;
  }

  reset() {
    this.#current = this.base;
  }
}
