import * as math from "#/math";

export const SECONDS_PER_YEAR = 365n * 24n * 60n * 60n;

export const CURVE_STEEPNESS = 4n * math.WAD;
export const TARGET_UTILIZATION = (9n * math.WAD) / 10n;
export const ADJUSTMENT_SPEED = (50n * math.WAD) / SECONDS_PER_YEAR;
export const INITIAL_RATE_AT_TARGET = (4n * math.WAD) / 100n / SECONDS_PER_YEAR;
export const MIN_RATE_AT_TARGET = math.WAD / 1000n / SECONDS_PER_YEAR;
export const MAX_RATE_AT_TARGET = (2n * math.WAD) / SECONDS_PER_YEAR;

/**
 * Distance between `utilization` and the target, normalized to [-1, 1] (WAD)
 * by the room available on that side of the target.
 */
export function normalizedError(utilization: bigint): bigint {
    const errNormFactor = utilization > TARGET_UTILIZATION ? math.WAD - TARGET_UTILIZATION : TARGET_UTILIZATION;
    return math.wDivToZero(utilization - TARGET_UTILIZATION, errNormFactor);
}

export function newRateAtTarget(startRateAtTarget: bigint, linearAdaptation: bigint): bigint {
    return math.clamp(math.wMulToZero(startRateAtTarget, math.wExp(linearAdaptation)), MIN_RATE_AT_TARGET, MAX_RATE_AT_TARGET);
}

/**
 * Below target the rate grows linearly from 0 to `rateAtTarget`. Above target
 * `rateAtTarget` is scaled by 1 + (steepness - 1) * err², reaching
 * steepness * rateAtTarget at full utilization.
 */
export function curve(rateAtTarget: bigint, err: bigint): bigint {
    if (err <= 0n) {
        return math.wMulDown(rateAtTarget, math.WAD + err);
    }
    const multiplier = math.WAD + math.wMulDown(CURVE_STEEPNESS - math.WAD, math.wMulDown(err, err));
    return math.wMulDown(rateAtTarget, multiplier);
}

export type Adaptation = {
    avgRateAtTarget: bigint;
    endRateAtTarget: bigint;
};

/**
 * Moves `startRateAtTarget` by exp(speed * err * elapsed) and returns the end
 * value with the period's trapezoidal average.
 */
export function adapt(startRateAtTarget: bigint, err: bigint, elapsed: bigint): Adaptation {
    const speed = math.wMulToZero(ADJUSTMENT_SPEED, err);
    const linearAdaptation = speed * elapsed;

    if (linearAdaptation === 0n) {
        return { avgRateAtTarget: startRateAtTarget, endRateAtTarget: startRateAtTarget };
    }

    const endRateAtTarget = newRateAtTarget(startRateAtTarget, linearAdaptation);
    const midRateAtTarget = newRateAtTarget(startRateAtTarget, linearAdaptation / 2n);
    const avgRateAtTarget = (startRateAtTarget + endRateAtTarget + 2n * midRateAtTarget) / 4n;

    return { avgRateAtTarget, endRateAtTarget };
}
