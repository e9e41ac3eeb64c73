/**
 * Iteration counter with a cyclic notion of time.
 *
 * The iteration index `i` grows monotonically over all runs of a simulation.
 * Time wraps around: after `i` steps it is `i mod tmax + tmin`, so a timer
 * with `tmax = 24` counts hours of a day.
 */
export class Timer {
  private i = 0;
  private iMax = 0;
  private t: number;
  private loopCnt = 0;
  private running = false;

  constructor(
    public readonly tmin: number = 0,
    public readonly tmax: number = 2 ** 31 - 1,
  ) {
    if (tmax < 1) {
      throw new RangeError(`Timer cycle length must be positive; got ${tmax}`);
    }
    this.t = tmin;
  }

  /** Extends the number of iterations the timer may step through. */
  public addIter(n: number): this {
    this.iMax += n;
    return this;
  }

  public getI(): number {
    return this.i;
  }

  public getT(): number {
    return this.t;
  }

  public getILeft(): number {
    return this.iMax - this.i;
  }

  /** Number of times time has wrapped around to `tmin`. */
  public getLoopCnt(): number {
    return this.loopCnt;
  }

  public isRunning(): boolean {
    return this.running;
  }

  public start(): this {
    this.running = true;
    return this;
  }

  public step(): this {
    if (this.i >= this.iMax) {
      throw new RangeError(`Timer has reached its last iteration (${this.iMax}).`);
    }
    this.i++;
    this.t = (this.i % this.tmax) + this.tmin;
    if (this.t === this.tmin) {
      this.loopCnt++;
    }
    return this;
  }

  /**
   * Stops the timer. Iterations that were not stepped through are dropped
   * so that a later run starts from the current iteration.
   */
  public stop(): this {
    this.iMax = this.i;
    this.running = false;
    return this;
  }

  public reset(): this {
    this.i = 0;
    this.iMax = 0;
    this.t = this.tmin;
    this.loopCnt = 0;
    this.running = false;
    return this;
  }
}
