import { WAD } from "./fixed";

const LN_2_INT = 693147180559945309n; // ln(2) * 1e18
const LN_WEI_INT = -41446531673892822312n; // ln(1e-18) * 1e18
const WEXP_UPPER_BOUND = 93859467695000404319n; // ln(type(int256).max / 1e36) * 1e18
const WEXP_UPPER_VALUE = 57716089161558943949701069502944508345128422502756744429568n; // e^WEXP_UPPER_BOUND * 1e18

/**
 * WAD-scaled e^x for a signed WAD-scaled x.
 *
 * Decomposes x = q * ln(2) + r with |r| <= ln(2) / 2, approximates e^r with a
 * second-order Taylor expansion and scales it by 2^q.
 */
export function wExp(x: bigint): bigint {
    if (x < LN_WEI_INT) {
        return 0n;
    }
    if (x >= WEXP_UPPER_BOUND) {
        return WEXP_UPPER_VALUE;
    }

    const roundingAdjustment = x < 0n ? -(LN_2_INT / 2n) : LN_2_INT / 2n;
    const q = (x + roundingAdjustment) / LN_2_INT;
    const r = x - q * LN_2_INT;

    const expR = WAD + r + (r * r) / WAD / 2n;

    return q >= 0n ? expR << q : expR >> -q;
}
