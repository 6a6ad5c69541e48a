import * as math from "#/math";

/**
 * Price of 1 unit of collateral quoted in loan-asset units, scaled by 1e36.
 */
export interface IOracle {
    price: () => bigint;
}

export class FixedPriceOracle implements IOracle {
    constructor(private value: bigint) {}

    // e.g. fromRatio(2000n) prices one collateral unit at 2000 loan units
    public static fromRatio(loanUnitsPerCollateralUnit: bigint): FixedPriceOracle {
        return new FixedPriceOracle(loanUnitsPerCollateralUnit * math.ORACLE_PRICE_SCALE);
    }

    public price(): bigint {
        return this.value;
    }

    public setPrice(value: bigint): void {
        this.value = value;
    }
}
