import { DonaError, ErrorCode } from "@dona/shared/errors";
import { RateLimitPolicyInput } from "@dona/shared/validation";

/**
 * One throttling tier: bucket capacity, continuous refill rate, and burst size.
 *
 * `burstSize` is informational. Refill is only ever capped by `capacity`.
 */
export class RateLimitPolicy {
  readonly capacity: number;
  readonly refillRatePerSecond: number;
  readonly burstSize: number;

  /**
   * @throws DonaError `CONFIG.INVALID_RATE_LIMIT_POLICY` when any value is not a
   *   finite number greater than zero.
   */
  constructor(capacity: number, refillRatePerSecond: number, burstSize: number) {
    const parsed = RateLimitPolicyInput.safeParse({ capacity, refillRatePerSecond, burstSize });
    if (!parsed.success) {
      const fields = parsed.error.issues.map((issue) => issue.path.join("."));
      throw new DonaError(
        ErrorCode.CONFIG.INVALID_RATE_LIMIT_POLICY,
        `Invalid rate limit policy: ${fields.join(", ")} must be positive`,
        500,
        { capacity, refillRatePerSecond, burstSize },
      );
    }

    this.capacity = parsed.data.capacity;
    this.refillRatePerSecond = parsed.data.refillRatePerSecond;
    this.burstSize = parsed.data.burstSize;
    Object.freeze(this);
  }

  static from(input: RateLimitPolicyInput): RateLimitPolicy {
    return new RateLimitPolicy(input.capacity, input.refillRatePerSecond, input.burstSize);
  }

  toJSON(): RateLimitPolicyInput {
    return {
      capacity: this.capacity,
      refillRatePerSecond: this.refillRatePerSecond,
      burstSize: this.burstSize,
    };
  }
}
