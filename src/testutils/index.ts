import * as viem from "viem";
import type * as domain from "#/domain";
import * as adaptive_curve from "#/irm/adaptive_curve";
import * as fixed_rate from "#/irm/fixed_rate";
import { Ledger } from "#/ledger";
import * as math from "#/math";
import { FixedPriceOracle } from "#/oracle";
import { Registry } from "#/registry";
import * as store from "#/store";
import { MemoryToken } from "#/token";

export const START = 1_700_000_000n;

// Deterministic checksummed address, e.g. address(1) = 0x00..01
export function address(n: number): viem.Address {
    return viem.getAddress(viem.pad(viem.toHex(n), { size: 20 }));
}

export const LEDGER = address(0x1000);
export const OWNER = address(0x1001);
export const FEE_RECIPIENT = address(0x1002);
export const LOAN_TOKEN = address(0x2001);
export const COLLATERAL_TOKEN = address(0x2002);
export const ORACLE = address(0x3001);
export const ADAPTIVE_IRM = address(0x4001);
export const FIXED_IRM = address(0x4002);

export const ALICE = address(0xa1);
export const BOB = address(0xb0);
export const CAROL = address(0xc0);

export const LLTV = (8n * math.WAD) / 10n;

export type TestClock = domain.Clock & {
    advance: (seconds: bigint) => void;
    set: (now: bigint) => void;
};

export function createClock(start: bigint = START): TestClock {
    let now = start;
    return Object.assign(() => now, {
        advance: (seconds: bigint) => {
            now += seconds;
        },
        set: (value: bigint) => {
            now = value;
        },
    });
}

export type Fixture = {
    clock: TestClock;
    journal: store.Journal;
    registry: Registry;
    loan: MemoryToken;
    collateral: MemoryToken;
    oracle: FixedPriceOracle;
    irm: adaptive_curve.RateModel;
    fixedIrm: fixed_rate.RateModel;
    ledger: Ledger;
    params: domain.MarketParams;
    id: domain.Id;
};

/**
 * Ledger with one market (loan/collateral priced at 2000, lltv 0.8) and the
 * given rate model. Every account in `accounts` holds `balance` of both tokens
 * with an unlimited allowance to the ledger.
 */
export function createFixture(options: { irm?: "adaptive" | "fixed" | "none"; ratePerSecond?: bigint; price?: bigint; accounts?: viem.Address[]; balance?: bigint } = {}): Fixture {
    const clock = createClock();
    const journal = new store.Journal();
    const loan = new MemoryToken(journal);
    const collateral = new MemoryToken(journal);
    const oracle = FixedPriceOracle.fromRatio(options.price ?? 2000n);
    const irm = new adaptive_curve.RateModel(journal, clock);
    const fixedIrm = new fixed_rate.RateModel(options.ratePerSecond ?? 0n);

    const registry = new Registry()
        .registerToken(LOAN_TOKEN, loan)
        .registerToken(COLLATERAL_TOKEN, collateral)
        .registerOracle(ORACLE, oracle)
        .registerRateModel(ADAPTIVE_IRM, irm)
        .registerRateModel(FIXED_IRM, fixedIrm);

    const ledger = new Ledger({ address: LEDGER, owner: OWNER, feeRecipient: FEE_RECIPIENT, registry, journal, clock });

    const irmAddress = irmFor(options.irm ?? "adaptive");
    ledger.enableIrm(OWNER, irmAddress);
    ledger.enableLltv(OWNER, LLTV);

    const params: domain.MarketParams = {
        loanToken: LOAN_TOKEN,
        collateralToken: COLLATERAL_TOKEN,
        oracle: ORACLE,
        irm: irmAddress,
        lltv: LLTV,
    };
    const id = ledger.createMarket(OWNER, params);

    const balance = options.balance ?? 1_000_000n;
    for (const account of options.accounts ?? [ALICE, BOB, CAROL]) {
        for (const token of [loan, collateral]) {
            token.mint(account, balance);
            token.approve(account, LEDGER, viem.maxUint256);
        }
    }

    return { clock, journal, registry, loan, collateral, oracle, irm, fixedIrm, ledger, params, id };
}

function irmFor(kind: "adaptive" | "fixed" | "none"): viem.Address {
    switch (kind) {
        case "adaptive":
            return ADAPTIVE_IRM;
        case "fixed":
            return FIXED_IRM;
        case "none":
            return viem.zeroAddress;
    }
}
