import type * as viem from "viem";
import type * as domain from "#/domain";

/**
 * Exactly one side of an amount drives an operation; the other is derived.
 */
export type Amount = AssetsAmount | SharesAmount;

interface AssetsAmount {
    assets: bigint;
    shares?: never;
}

interface SharesAmount {
    shares: bigint;
    assets?: never;
}

export type LiquidationAmount = SeizedAmount | RepaidAmount;

interface SeizedAmount {
    seizedAssets: bigint;
    repaidShares?: never;
}

interface RepaidAmount {
    repaidShares: bigint;
    seizedAssets?: never;
}

export type AssetsAndShares = {
    assets: bigint;
    shares: bigint;
};

export type LiquidationResult = {
    seizedAssets: bigint;
    repaidAssets: bigint;
    repaidShares: bigint;
    badDebtAssets: bigint;
    badDebtShares: bigint;
};

/**
 * Handlers a caller exposes at its address. Each one runs after the ledger has
 * updated its state and before it pulls funds from the caller.
 */
export interface CallbackReceiver {
    onSupply?: (assets: bigint, data: viem.Hex) => void;
    onRepay?: (assets: bigint, data: viem.Hex) => void;
    onSupplyCollateral?: (assets: bigint, data: viem.Hex) => void;
    onLiquidate?: (repaidAssets: bigint, data: viem.Hex) => void;
    onFlashLoan?: (assets: bigint, data: viem.Hex) => void;
}

export type CallbackName = keyof CallbackReceiver;

export enum EventKind {
    CreateMarket = "create_market",
    Supply = "supply",
    Withdraw = "withdraw",
    Borrow = "borrow",
    Repay = "repay",
    SupplyCollateral = "supply_collateral",
    WithdrawCollateral = "withdraw_collateral",
    Liquidate = "liquidate",
    FlashLoan = "flash_loan",
    SetAuthorization = "set_authorization",
    AccrueInterest = "accrue_interest",
    SetOwner = "set_owner",
    SetFee = "set_fee",
    SetFeeRecipient = "set_fee_recipient",
    EnableIrm = "enable_irm",
    EnableLltv = "enable_lltv",
}

type Payloads = {
    [EventKind.CreateMarket]: { marketId: domain.Id; marketParams: domain.MarketParams };
    [EventKind.Supply]: { marketId: domain.Id; caller: viem.Address; onBehalf: viem.Address; assets: bigint; shares: bigint };
    [EventKind.Withdraw]: { marketId: domain.Id; caller: viem.Address; onBehalf: viem.Address; receiver: viem.Address; assets: bigint; shares: bigint };
    [EventKind.Borrow]: { marketId: domain.Id; caller: viem.Address; onBehalf: viem.Address; receiver: viem.Address; assets: bigint; shares: bigint };
    [EventKind.Repay]: { marketId: domain.Id; caller: viem.Address; onBehalf: viem.Address; assets: bigint; shares: bigint };
    [EventKind.SupplyCollateral]: { marketId: domain.Id; caller: viem.Address; onBehalf: viem.Address; assets: bigint };
    [EventKind.WithdrawCollateral]: { marketId: domain.Id; caller: viem.Address; onBehalf: viem.Address; receiver: viem.Address; assets: bigint };
    [EventKind.Liquidate]: {
        marketId: domain.Id;
        caller: viem.Address;
        borrower: viem.Address;
        repaidAssets: bigint;
        repaidShares: bigint;
        seizedAssets: bigint;
        badDebtAssets: bigint;
        badDebtShares: bigint;
    };
    [EventKind.FlashLoan]: { caller: viem.Address; token: viem.Address; assets: bigint };
    [EventKind.SetAuthorization]: { caller: viem.Address; authorizer: viem.Address; authorized: viem.Address; isAuthorized: boolean };
    [EventKind.AccrueInterest]: { marketId: domain.Id; prevBorrowRate: bigint; interest: bigint; feeShares: bigint };
    [EventKind.SetOwner]: { newOwner: viem.Address };
    [EventKind.SetFee]: { marketId: domain.Id; newFee: bigint };
    [EventKind.SetFeeRecipient]: { newFeeRecipient: viem.Address };
    [EventKind.EnableIrm]: { irm: viem.Address };
    [EventKind.EnableLltv]: { lltv: bigint };
};

export type LedgerEvent = {
    [K in EventKind]: { id: string; kind: K; timestamp: bigint } & Payloads[K];
}[EventKind];

export type LedgerEventInput = {
    [K in EventKind]: { kind: K } & Payloads[K];
}[EventKind];

export type EventListener = (event: LedgerEvent) => void;
