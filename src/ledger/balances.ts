import * as viem from "viem";
import * as domain from "#/domain";
import * as math from "#/math";
import type * as oracle from "#/oracle";
import * as health from "./health";
import type { Ledger } from "./index";

/**
 * Balances as they would read right after the next accrual. None of these
 * write to the ledger or the rate model.
 */
export function expectedSupplyAssets(ledger: Ledger, params: domain.MarketParams, account: viem.Address): bigint {
    const { market, feeShares } = ledger.expectedAccrual(params);
    const { supplyShares } = ledger.position(domain.marketId(params), account);
    const pendingShares = viem.getAddress(account) === ledger.feeRecipient() ? feeShares : 0n;
    return math.toAssetsDown(supplyShares + pendingShares, market.totalSupplyAssets, market.totalSupplyShares);
}

export function expectedBorrowAssets(ledger: Ledger, params: domain.MarketParams, account: viem.Address): bigint {
    const market = ledger.expectedMarket(params);
    const position = ledger.position(domain.marketId(params), account);
    return health.borrowedAssets(market, position);
}

export function expectedTotalSupplyAssets(ledger: Ledger, params: domain.MarketParams): bigint {
    return ledger.expectedMarket(params).totalSupplyAssets;
}

export function expectedTotalBorrowAssets(ledger: Ledger, params: domain.MarketParams): bigint {
    return ledger.expectedMarket(params).totalBorrowAssets;
}

export function expectedTotalSupplyShares(ledger: Ledger, params: domain.MarketParams): bigint {
    return ledger.expectedMarket(params).totalSupplyShares;
}

// Null when the account has no debt
export function expectedHealthFactor(ledger: Ledger, params: domain.MarketParams, account: viem.Address, priceFeed: oracle.IOracle): bigint | null {
    const market = ledger.expectedMarket(params);
    const position = ledger.position(domain.marketId(params), account);
    return health.healthFactor(market, position, params.lltv, priceFeed.price());
}
