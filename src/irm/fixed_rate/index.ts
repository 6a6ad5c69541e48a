import type * as domain from "#/domain";
import type * as types from "#/irm/types";

export class RateModel implements types.IRateModel {
    constructor(private readonly ratePerSecond: bigint) {}

    public borrowRate(_params: domain.MarketParams, _market: domain.Market): bigint {
        return this.ratePerSecond;
    }

    public borrowRateView(_id: domain.Id, _utilization: bigint): bigint {
        return this.ratePerSecond;
    }
}
