import * as t from "vitest";
import * as errors from "#/errors";
import { FixedPriceOracle } from "#/oracle";
import { Registry } from "#/registry";
import * as testutils from "#/testutils";

t.describe("registry", () => {
    t.test("should resolve registered collaborators", () => {
        const oracle = FixedPriceOracle.fromRatio(3n);
        const registry = new Registry().registerOracle(testutils.ORACLE, oracle);

        t.expect(registry.oracle(testutils.ORACLE)).toBe(oracle);
    });

    t.test("should fail on an unknown address", () => {
        const registry = new Registry();

        t.expect(() => registry.token(testutils.LOAN_TOKEN)).toThrow(errors.UnknownContractError);
        t.expect(() => registry.receiver(testutils.ALICE)).toThrow(`no callback receiver at ${testutils.ALICE}`);
    });
});

t.describe("fixed price oracle", () => {
    t.test("should scale ratios by 1e36", () => {
        const oracle = FixedPriceOracle.fromRatio(2000n);

        t.expect(oracle.price()).toBe(2000n * 10n ** 36n);

        oracle.setPrice(5n);
        t.expect(oracle.price()).toBe(5n);
    });
});
