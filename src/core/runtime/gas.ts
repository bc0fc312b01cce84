import { GAS } from '../../constants/gas';
import { DisperseError } from '../errors';

/**
 * Execution budget for one call (or one forwarded sub-call)
 */
export class GasMeter {
  private used = 0;

  constructor(readonly limit: number) {}

  get gasUsed(): number {
    return this.used;
  }

  get remaining(): number {
    return this.limit - this.used;
  }

  /**
   * Charge `units`; running past the limit burns the whole budget and reverts
   */
  consume(units: number): void {
    const left = this.remaining;
    if (units > left) {
      this.used = this.limit;
      throw new DisperseError('OUT_OF_GAS', `Out of gas: needed ${units}, ${left} left`);
    }
    this.used += units;
  }

  /**
   * Budget handed to receiver code: all but 1/64th of what is left
   */
  fork(): GasMeter {
    const remaining = this.remaining;
    return new GasMeter(remaining - Math.floor(remaining / GAS.FORWARD_RESERVE_DIVISOR));
  }

  /**
   * Charge what a forked meter consumed
   */
  settle(child: GasMeter): void {
    this.consume(child.gasUsed);
  }
}
