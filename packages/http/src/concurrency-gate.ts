import { err, ok, type Result } from 'neverthrow';

import { InternalError } from './types.js';

/**
 * Right to have one logical request in flight. Only the gate that issued a permit can
 * take it back, and only once.
 */
export class GatePermit {
  constructor(
    readonly id: number,
    readonly gate: ConcurrencyGate
  ) {}
}

interface Waiter {
  grant: (permit: GatePermit) => void;
  reject: (error: InternalError) => void;
}

/**
 * Bounded admission pool with a FIFO waiter queue. Safe to share between any number of
 * clients; the pool is the only mutable state they share.
 */
export class ConcurrencyGate {
  private readonly outstanding = new Set<GatePermit>();
  private readonly waitQueue: Waiter[] = [];
  private nextPermitId = 1;
  private closed = false;

  constructor(readonly limit: number) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new RangeError(`Concurrency limit must be a positive integer, got ${limit}`);
    }
  }

  get available(): number {
    return this.limit - this.outstanding.size;
  }

  get inFlight(): number {
    return this.outstanding.size;
  }

  get pending(): number {
    return this.waitQueue.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Suspend until a slot is free. Waiters are served in arrival order.
   */
  async acquire(): Promise<Result<GatePermit, InternalError>> {
    if (this.closed) {
      return err(new InternalError('Concurrency gate is closed', 'gate_closed'));
    }

    if (this.outstanding.size < this.limit) {
      return ok(this.issue());
    }

    return new Promise<Result<GatePermit, InternalError>>((resolve) => {
      this.waitQueue.push({
        grant: (permit) => resolve(ok(permit)),
        reject: (error) => resolve(err(error)),
      });
    });
  }

  /**
   * Return a permit to the pool and wake the next waiter. Releasing twice or releasing a
   * permit from another gate is a no-op.
   *
   * @returns whether the permit was outstanding
   */
  release(permit: GatePermit): boolean {
    if (permit.gate !== this || !this.outstanding.delete(permit)) {
      return false;
    }
    this.drain();
    return true;
  }

  /**
   * Bounded re-acquisition after a long wait. A waiter that times out leaves the queue
   * without ever holding a slot.
   */
  async tryReacquire(timeoutMs: number): Promise<GatePermit | undefined> {
    if (this.closed) {
      return undefined;
    }

    if (this.outstanding.size < this.limit) {
      return this.issue();
    }

    return new Promise<GatePermit | undefined>((resolve) => {
      const waiter: Waiter = {
        grant: (permit) => {
          clearTimeout(timer);
          resolve(permit);
        },
        reject: () => {
          clearTimeout(timer);
          resolve(undefined);
        },
      };
      const timer = setTimeout(() => {
        const index = this.waitQueue.indexOf(waiter);
        if (index !== -1) {
          this.waitQueue.splice(index, 1);
        }
        resolve(undefined);
      }, timeoutMs);
      this.waitQueue.push(waiter);
    });
  }

  /**
   * Reject every pending waiter and refuse further admissions. Outstanding permits stay
   * valid until released.
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    const waiters = this.waitQueue.splice(0);
    for (const waiter of waiters) {
      waiter.reject(new InternalError('Concurrency gate is closed', 'gate_closed'));
    }
  }

  private issue(): GatePermit {
    const permit = new GatePermit(this.nextPermitId++, this);
    this.outstanding.add(permit);
    return permit;
  }

  private drain(): void {
    while (this.outstanding.size < this.limit) {
      const next = this.waitQueue.shift();
      if (!next) {
        return;
      }
      next.grant(this.issue());
    }
  }
}

/**
 * Explicit optional handle on the permit of one logical request.
 *
 * The executor may take the permit out (to release it around a long wait) and later
 * replace it with a re-acquired one. `release()` hands back whatever is held and is
 * effective once; later calls do nothing.
 */
export class PermitHolder {
  private permit: GatePermit | undefined;
  private finished = false;

  constructor(
    private readonly gate: ConcurrencyGate,
    permit?: GatePermit
  ) {
    this.permit = permit;
  }

  get held(): boolean {
    return this.permit !== undefined;
  }

  get released(): boolean {
    return this.finished;
  }

  /**
   * Remove the permit from the holder; the caller becomes responsible for it.
   */
  take(): GatePermit | undefined {
    const permit = this.permit;
    this.permit = undefined;
    return permit;
  }

  /**
   * Install a permit, returning any previously held one to the gate. After release() the
   * new permit goes straight back to the gate.
   */
  replace(permit: GatePermit | undefined): void {
    const previous = this.permit;
    this.permit = undefined;
    if (previous) {
      this.gate.release(previous);
    }
    if (this.finished) {
      if (permit) {
        this.gate.release(permit);
      }
      return;
    }
    this.permit = permit;
  }

  release(): void {
    if (this.finished) {
      return;
    }
    this.finished = true;
    const permit = this.take();
    if (permit) {
      this.gate.release(permit);
    }
  }
}
