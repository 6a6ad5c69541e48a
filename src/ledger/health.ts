import type * as domain from "#/domain";
import * as math from "#/math";

export const MAX_FEE = (25n * math.WAD) / 100n;
export const MAX_LIQUIDATION_INCENTIVE_FACTOR = (115n * math.WAD) / 100n;
export const LIQUIDATION_CURSOR = (3n * math.WAD) / 10n;

export function borrowedAssets(market: domain.Market, position: domain.Position): bigint {
    return math.toAssetsUp(position.borrowShares, market.totalBorrowAssets, market.totalBorrowShares);
}

export function maxBorrow(position: domain.Position, lltv: bigint, collateralPrice: bigint): bigint {
    return math.wMulDown(math.mulDivDown(position.collateral, collateralPrice, math.ORACLE_PRICE_SCALE), lltv);
}

export function isHealthy(market: domain.Market, position: domain.Position, lltv: bigint, collateralPrice: bigint): boolean {
    return maxBorrow(position, lltv, collateralPrice) >= borrowedAssets(market, position);
}

/**
 * Max borrow over borrowed assets (WAD), or null when nothing is borrowed.
 */
export function healthFactor(market: domain.Market, position: domain.Position, lltv: bigint, collateralPrice: bigint): bigint | null {
    const borrowed = borrowedAssets(market, position);
    if (borrowed === 0n) {
        return null;
    }
    return math.wDivDown(maxBorrow(position, lltv, collateralPrice), borrowed);
}

/**
 * 1 / (1 - cursor * (1 - lltv)), capped at 1.15. The closer lltv is to 1, the
 * smaller the incentive.
 */
export function liquidationIncentiveFactor(lltv: bigint): bigint {
    return math.min(MAX_LIQUIDATION_INCENTIVE_FACTOR, math.wDivDown(math.WAD, math.WAD - math.wMulDown(LIQUIDATION_CURSOR, math.WAD - lltv)));
}
