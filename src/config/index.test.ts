import * as t from "vitest";
import * as viem from "viem";
import * as config from "#/config";
import * as testutils from "#/testutils";

t.describe("config", () => {
    const env = {
        LEDGER_ADDRESS: testutils.LEDGER.toLowerCase(),
        LEDGER_OWNER: testutils.OWNER,
    };

    t.test("should checksum addresses and apply defaults", () => {
        t.expect(config.loadConfig(env)).toEqual({
            address: testutils.LEDGER,
            owner: testutils.OWNER,
            feeRecipient: viem.zeroAddress,
            logLevels: ["log", "error", "warn"],
        });
    });

    t.test("should parse log levels", () => {
        t.expect(config.loadConfig({ ...env, LEDGER_LOG_LEVELS: "error, debug" }).logLevels).toEqual(["error", "debug"]);
        t.expect(config.loadConfig({ ...env, LEDGER_LOG_LEVELS: "none" }).logLevels).toEqual([]);
    });

    t.test("should reject invalid values", () => {
        t.expect(() => config.loadConfig({ ...env, LEDGER_OWNER: "0x1234" })).toThrow("invalid address");
        t.expect(() => config.loadConfig({ ...env, LEDGER_LOG_LEVELS: "loud" })).toThrow();
        t.expect(() => config.loadConfig({ LEDGER_OWNER: testutils.OWNER })).toThrow();
    });
});
