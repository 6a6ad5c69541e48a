import type * as domain from "#/domain";

export interface IRateModel {
    // Per-second borrow rate (WAD). May update the model's own state.
    borrowRate: (params: domain.MarketParams, market: domain.Market) => bigint;
    // Same rate projected to the current time, without side effects.
    borrowRateView: (id: domain.Id, utilization: bigint) => bigint;
}
