import * as domain from "#/domain";
import type * as types from "#/irm/types";
import * as store from "#/store";
import * as utils from "./curve.utils";

export * from "./curve.utils";

type RateState = {
    rateAtTarget: bigint;
    lastUpdate: bigint;
};

/**
 * Adaptive curve rate model. Each market keeps a rate at target utilization
 * that drifts up while utilization sits above target and down while below.
 *
 * State lives in the ledger's journal so a reverted call also reverts the
 * adaptation it triggered.
 */
export class RateModel implements types.IRateModel {
    private readonly states: store.JournaledMap<domain.Id, RateState>;

    constructor(
        journal: store.Journal,
        private readonly clock: domain.Clock,
    ) {
        this.states = new store.JournaledMap(journal);
    }

    public borrowRate(params: domain.MarketParams, market: domain.Market): bigint {
        const id = domain.marketId(params);
        const { rate, rateAtTarget } = this.compute(id, domain.utilization(market));
        this.states.set(id, { rateAtTarget, lastUpdate: this.clock() });
        return rate;
    }

    public borrowRateView(id: domain.Id, utilization: bigint): bigint {
        return this.compute(id, utilization).rate;
    }

    // 0 until the market's first rate query
    public rateAtTarget(id: domain.Id): bigint {
        return this.states.get(id)?.rateAtTarget ?? 0n;
    }

    private compute(id: domain.Id, utilization: bigint): { rate: bigint; rateAtTarget: bigint } {
        const err = utils.normalizedError(utilization);
        const state = this.states.get(id);

        if (!state) {
            return { rate: utils.curve(utils.INITIAL_RATE_AT_TARGET, err), rateAtTarget: utils.INITIAL_RATE_AT_TARGET };
        }

        const elapsed = this.clock() - state.lastUpdate;
        const { avgRateAtTarget, endRateAtTarget } = utils.adapt(state.rateAtTarget, err, elapsed);

        return { rate: utils.curve(avgRateAtTarget, err), rateAtTarget: endRateAtTarget };
    }
}
