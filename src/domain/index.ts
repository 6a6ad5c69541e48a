import * as viem from "viem";
import * as math from "#/math";

export type Id = viem.Hex;

export type MarketParams = {
    loanToken: viem.Address;
    collateralToken: viem.Address;
    oracle: viem.Address;
    irm: viem.Address;
    lltv: bigint;
};

export type Market = {
    totalSupplyAssets: bigint;
    totalSupplyShares: bigint;
    totalBorrowAssets: bigint;
    totalBorrowShares: bigint;
    lastUpdate: bigint;
    fee: bigint;
};

export type Position = {
    supplyShares: bigint;
    borrowShares: bigint;
    collateral: bigint;
};

// Seconds since epoch
export type Clock = () => bigint;

export const EMPTY_DATA: viem.Hex = "0x";

const MARKET_PARAMS_ABI = viem.parseAbiParameters("address loanToken, address collateralToken, address oracle, address irm, uint256 lltv");

/**
 * Deterministic market identifier: keccak256 of the abi-encoded params.
 */
export function marketId(params: MarketParams): Id {
    return viem.keccak256(viem.encodeAbiParameters(MARKET_PARAMS_ABI, [params.loanToken, params.collateralToken, params.oracle, params.irm, params.lltv]));
}

export function emptyMarket(now: bigint): Market {
    return {
        totalSupplyAssets: 0n,
        totalSupplyShares: 0n,
        totalBorrowAssets: 0n,
        totalBorrowShares: 0n,
        lastUpdate: now,
        fee: 0n,
    };
}

export function emptyPosition(): Position {
    return { supplyShares: 0n, borrowShares: 0n, collateral: 0n };
}

// Borrowed over supplied (WAD), 0 for an empty market
export function utilization(market: Pick<Market, "totalBorrowAssets" | "totalSupplyAssets">): bigint {
    if (market.totalSupplyAssets === 0n) {
        return 0n;
    }
    return math.wDivDown(market.totalBorrowAssets, market.totalSupplyAssets);
}

export function systemClock(): bigint {
    return BigInt(Math.floor(Date.now() / 1000));
}
