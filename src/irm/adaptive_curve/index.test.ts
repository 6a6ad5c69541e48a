import * as t from "vitest";
import * as domain from "#/domain";
import * as adaptive_curve from "#/irm/adaptive_curve";
import * as math from "#/math";
import * as store from "#/store";
import * as testutils from "#/testutils";

t.describe("adaptive curve", () => {
    const params: domain.MarketParams = {
        loanToken: testutils.LOAN_TOKEN,
        collateralToken: testutils.COLLATERAL_TOKEN,
        oracle: testutils.ORACLE,
        irm: testutils.ADAPTIVE_IRM,
        lltv: testutils.LLTV,
    };
    const id = domain.marketId(params);

    function market(totalBorrowAssets: bigint, totalSupplyAssets: bigint): domain.Market {
        return { ...domain.emptyMarket(testutils.START), totalBorrowAssets, totalSupplyAssets };
    }

    function setup() {
        const journal = new store.Journal();
        const clock = testutils.createClock();
        return { journal, clock, irm: new adaptive_curve.RateModel(journal, clock) };
    }

    t.describe("curve", () => {
        t.test("should be linear from zero below target", () => {
            t.expect(adaptive_curve.curve(math.WAD, -math.WAD)).toBe(0n);
            t.expect(adaptive_curve.curve(math.WAD, -math.WAD / 2n)).toBe(math.WAD / 2n);
            t.expect(adaptive_curve.curve(math.WAD, 0n)).toBe(math.WAD);
        });

        t.test("should grow with the square of the error above target", () => {
            t.expect(adaptive_curve.curve(math.WAD, math.WAD / 2n)).toBe((175n * math.WAD) / 100n);
            t.expect(adaptive_curve.curve(math.WAD, math.WAD)).toBe(4n * math.WAD);
        });

        t.test("should normalize the error on each side of the target", () => {
            t.expect(adaptive_curve.normalizedError(adaptive_curve.TARGET_UTILIZATION)).toBe(0n);
            t.expect(adaptive_curve.normalizedError(0n)).toBe(-math.WAD);
            t.expect(adaptive_curve.normalizedError((45n * math.WAD) / 100n)).toBe(-math.WAD / 2n);
            t.expect(adaptive_curve.normalizedError(math.WAD)).toBe(math.WAD);
        });
    });

    t.describe("rate model", () => {
        t.test("should start at the initial rate at target", () => {
            const { irm } = setup();

            t.expect(irm.rateAtTarget(id)).toBe(0n);
            t.expect(irm.borrowRate(params, market(90n, 100n))).toBe(adaptive_curve.INITIAL_RATE_AT_TARGET);
            t.expect(irm.rateAtTarget(id)).toBe(adaptive_curve.INITIAL_RATE_AT_TARGET);
        });

        t.test("should follow the curve on the first query", () => {
            const { irm } = setup();

            t.expect(irm.borrowRate(params, market(0n, 100n))).toBe(0n);
            t.expect(irm.borrowRate(params, market(100n, 100n))).toBe(4n * adaptive_curve.INITIAL_RATE_AT_TARGET);
        });

        t.test("should not adapt while time stands still", () => {
            const { irm } = setup();
            irm.borrowRate(params, market(100n, 100n));

            irm.borrowRate(params, market(100n, 100n));

            t.expect(irm.rateAtTarget(id)).toBe(adaptive_curve.INITIAL_RATE_AT_TARGET);
        });

        t.test("should hold the rate at target when utilization sits on target", () => {
            const { irm, clock } = setup();
            irm.borrowRate(params, market(90n, 100n));

            clock.advance(adaptive_curve.SECONDS_PER_YEAR);
            irm.borrowRate(params, market(90n, 100n));

            t.expect(irm.rateAtTarget(id)).toBe(adaptive_curve.INITIAL_RATE_AT_TARGET);
        });

        t.test("should climb to the ceiling after a year of full utilization", () => {
            const { irm, clock } = setup();
            irm.borrowRate(params, market(100n, 100n));

            clock.advance(adaptive_curve.SECONDS_PER_YEAR);
            irm.borrowRate(params, market(100n, 100n));

            t.expect(irm.rateAtTarget(id)).toBe(adaptive_curve.MAX_RATE_AT_TARGET);
        });

        t.test("should sink to the floor after a year of zero utilization", () => {
            const { irm, clock } = setup();
            irm.borrowRate(params, market(0n, 100n));

            clock.advance(adaptive_curve.SECONDS_PER_YEAR);
            irm.borrowRate(params, market(0n, 100n));

            t.expect(irm.rateAtTarget(id)).toBe(adaptive_curve.MIN_RATE_AT_TARGET);
        });

        t.test("should rise within a day above target", () => {
            const { irm, clock } = setup();
            irm.borrowRate(params, market(95n, 100n));

            clock.advance(86_400n);
            const rate = irm.borrowRate(params, market(95n, 100n));

            t.expect(irm.rateAtTarget(id) > adaptive_curve.INITIAL_RATE_AT_TARGET).toBe(true);
            t.expect(rate > adaptive_curve.curve(adaptive_curve.INITIAL_RATE_AT_TARGET, adaptive_curve.normalizedError((95n * math.WAD) / 100n))).toBe(true);
        });

        t.test("should project without storing in the view", () => {
            const { irm, clock } = setup();
            irm.borrowRate(params, market(100n, 100n));
            clock.advance(86_400n);

            const projected = irm.borrowRateView(id, math.WAD);

            t.expect(irm.rateAtTarget(id)).toBe(adaptive_curve.INITIAL_RATE_AT_TARGET);
            t.expect(irm.borrowRate(params, market(100n, 100n))).toBe(projected);
        });

        t.test("should forget an adaptation that was rolled back", () => {
            const { irm, journal } = setup();

            const checkpoint = journal.begin();
            irm.borrowRate(params, market(90n, 100n));
            journal.rollback(checkpoint);

            t.expect(irm.rateAtTarget(id)).toBe(0n);
        });
    });
});
