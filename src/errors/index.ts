import type * as viem from "viem";
import type * as domain from "#/domain";

export enum ErrorCode {
    // Configuration
    UnknownMarket = "unknown_market",
    AlreadyExists = "already_exists",
    UnsupportedRateModel = "unsupported_rate_model",
    UnsupportedLltv = "unsupported_lltv",
    MaxLltvExceeded = "max_lltv_exceeded",
    MaxFeeExceeded = "max_fee_exceeded",
    AlreadySet = "already_set",
    ZeroAddress = "zero_address",
    UnknownContract = "unknown_contract",
    MissingCallback = "missing_callback",

    // Input
    InconsistentInput = "inconsistent_input",
    ZeroAmount = "zero_amount",

    // Authorization
    Unauthorized = "unauthorized",
    NotOwner = "not_owner",

    // Invariants
    InsufficientLiquidity = "insufficient_liquidity",
    InsufficientCollateral = "insufficient_collateral",
    HealthyPosition = "healthy_position",
    InsufficientPosition = "insufficient_position",

    // Transfers
    InsufficientBalance = "insufficient_balance",
    InsufficientAllowance = "insufficient_allowance",
    Unrepaid = "unrepaid",

    // Concurrency
    Reentrancy = "reentrancy",
}

export class LedgerError extends Error {
    constructor(
        public readonly code: ErrorCode,
        message: string,
        options?: { cause?: unknown },
    ) {
        super(message, options);
        this.name = "LedgerError";
        Object.setPrototypeOf(this, LedgerError.prototype);
    }

    toJSON(): string {
        return this.message;
    }
}

export class UnknownMarketError extends LedgerError {
    constructor(id: domain.Id) {
        super(ErrorCode.UnknownMarket, `unknown market ${id}`);
        this.name = "UnknownMarketError";
        Object.setPrototypeOf(this, UnknownMarketError.prototype);
    }
}

export class AlreadyExistsError extends LedgerError {
    constructor(id: domain.Id) {
        super(ErrorCode.AlreadyExists, `market ${id} already exists`);
        this.name = "AlreadyExistsError";
        Object.setPrototypeOf(this, AlreadyExistsError.prototype);
    }
}

export class UnsupportedRateModelError extends LedgerError {
    constructor(irm: viem.Address) {
        super(ErrorCode.UnsupportedRateModel, `rate model ${irm} is not enabled`);
        this.name = "UnsupportedRateModelError";
        Object.setPrototypeOf(this, UnsupportedRateModelError.prototype);
    }
}

export class UnsupportedLltvError extends LedgerError {
    constructor(lltv: bigint) {
        super(ErrorCode.UnsupportedLltv, `lltv ${lltv} is not enabled`);
        this.name = "UnsupportedLltvError";
        Object.setPrototypeOf(this, UnsupportedLltvError.prototype);
    }
}

export class MaxLltvExceededError extends LedgerError {
    constructor() {
        super(ErrorCode.MaxLltvExceeded, "max LLTV exceeded");
        this.name = "MaxLltvExceededError";
        Object.setPrototypeOf(this, MaxLltvExceededError.prototype);
    }
}

export class MaxFeeExceededError extends LedgerError {
    constructor() {
        super(ErrorCode.MaxFeeExceeded, "max fee exceeded");
        this.name = "MaxFeeExceededError";
        Object.setPrototypeOf(this, MaxFeeExceededError.prototype);
    }
}

export class AlreadySetError extends LedgerError {
    constructor() {
        super(ErrorCode.AlreadySet, "already set");
        this.name = "AlreadySetError";
        Object.setPrototypeOf(this, AlreadySetError.prototype);
    }
}

export class ZeroAddressError extends LedgerError {
    constructor() {
        super(ErrorCode.ZeroAddress, "zero address");
        this.name = "ZeroAddressError";
        Object.setPrototypeOf(this, ZeroAddressError.prototype);
    }
}

export class UnknownContractError extends LedgerError {
    constructor(kind: string, address: viem.Address) {
        super(ErrorCode.UnknownContract, `no ${kind} at ${address}`);
        this.name = "UnknownContractError";
        Object.setPrototypeOf(this, UnknownContractError.prototype);
    }
}

export class MissingCallbackError extends LedgerError {
    constructor(callback: string, address: viem.Address) {
        super(ErrorCode.MissingCallback, `${address} does not implement ${callback}`);
        this.name = "MissingCallbackError";
        Object.setPrototypeOf(this, MissingCallbackError.prototype);
    }
}

export class InconsistentInputError extends LedgerError {
    constructor() {
        super(ErrorCode.InconsistentInput, "inconsistent input");
        this.name = "InconsistentInputError";
        Object.setPrototypeOf(this, InconsistentInputError.prototype);
    }
}

export class ZeroAmountError extends LedgerError {
    constructor() {
        super(ErrorCode.ZeroAmount, "zero amount");
        this.name = "ZeroAmountError";
        Object.setPrototypeOf(this, ZeroAmountError.prototype);
    }
}

export class UnauthorizedError extends LedgerError {
    constructor() {
        super(ErrorCode.Unauthorized, "unauthorized");
        this.name = "UnauthorizedError";
        Object.setPrototypeOf(this, UnauthorizedError.prototype);
    }
}

export class NotOwnerError extends LedgerError {
    constructor() {
        super(ErrorCode.NotOwner, "not owner");
        this.name = "NotOwnerError";
        Object.setPrototypeOf(this, NotOwnerError.prototype);
    }
}

export class InsufficientLiquidityError extends LedgerError {
    constructor() {
        super(ErrorCode.InsufficientLiquidity, "insufficient liquidity");
        this.name = "InsufficientLiquidityError";
        Object.setPrototypeOf(this, InsufficientLiquidityError.prototype);
    }
}

export class InsufficientCollateralError extends LedgerError {
    constructor() {
        super(ErrorCode.InsufficientCollateral, "insufficient collateral");
        this.name = "InsufficientCollateralError";
        Object.setPrototypeOf(this, InsufficientCollateralError.prototype);
    }
}

export class HealthyPositionError extends LedgerError {
    constructor() {
        super(ErrorCode.HealthyPosition, "position is healthy");
        this.name = "HealthyPositionError";
        Object.setPrototypeOf(this, HealthyPositionError.prototype);
    }
}

export class InsufficientPositionError extends LedgerError {
    constructor(field: keyof domain.Position) {
        super(ErrorCode.InsufficientPosition, `insufficient ${field}`);
        this.name = "InsufficientPositionError";
        Object.setPrototypeOf(this, InsufficientPositionError.prototype);
    }
}

export class InsufficientBalanceError extends LedgerError {
    constructor(account: viem.Address) {
        super(ErrorCode.InsufficientBalance, `insufficient balance for ${account}`);
        this.name = "InsufficientBalanceError";
        Object.setPrototypeOf(this, InsufficientBalanceError.prototype);
    }
}

export class InsufficientAllowanceError extends LedgerError {
    constructor(owner: viem.Address, spender: viem.Address) {
        super(ErrorCode.InsufficientAllowance, `insufficient allowance from ${owner} to ${spender}`);
        this.name = "InsufficientAllowanceError";
        Object.setPrototypeOf(this, InsufficientAllowanceError.prototype);
    }
}

export class UnrepaidError extends LedgerError {
    constructor(cause: unknown) {
        super(ErrorCode.Unrepaid, "flash loan not repaid", { cause });
        this.name = "UnrepaidError";
        Object.setPrototypeOf(this, UnrepaidError.prototype);
    }
}

export class ReentrancyError extends LedgerError {
    constructor(operation: string) {
        super(ErrorCode.Reentrancy, `reentrant call to ${operation}`);
        this.name = "ReentrancyError";
        Object.setPrototypeOf(this, ReentrancyError.prototype);
    }
}
