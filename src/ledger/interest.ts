import type * as domain from "#/domain";
import * as math from "#/math";

export type Accrual = {
    market: domain.Market;
    interest: bigint;
    feeShares: bigint;
};

/**
 * Applies `borrowRate` linearly over the time elapsed since `market.lastUpdate`.
 * Interest is added to both totals and the fee part is minted as supply shares
 * at the post-interest, pre-mint exchange rate.
 */
export function accrueInterest(market: domain.Market, borrowRate: bigint, now: bigint): Accrual {
    const elapsed = now - market.lastUpdate;

    // Early return if nothing can accrue
    if (elapsed <= 0n || market.totalBorrowAssets === 0n || borrowRate === 0n) {
        return { market: { ...market, lastUpdate: elapsed > 0n ? now : market.lastUpdate }, interest: 0n, feeShares: 0n };
    }

    const interest = math.wMulDown(market.totalBorrowAssets, borrowRate * elapsed);

    const marketWithNewTotal: domain.Market = {
        ...market,
        totalBorrowAssets: market.totalBorrowAssets + interest,
        totalSupplyAssets: market.totalSupplyAssets + interest,
        lastUpdate: now,
    };

    if (marketWithNewTotal.fee === 0n) {
        return { market: marketWithNewTotal, interest, feeShares: 0n };
    }

    const feeAmount = math.wMulDown(interest, marketWithNewTotal.fee);
    const feeShares = math.toSharesDown(feeAmount, marketWithNewTotal.totalSupplyAssets - feeAmount, marketWithNewTotal.totalSupplyShares);

    return {
        market: { ...marketWithNewTotal, totalSupplyShares: marketWithNewTotal.totalSupplyShares + feeShares },
        interest,
        feeShares,
    };
}
