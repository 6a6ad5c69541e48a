export const WAD = 10n ** 18n;
export const ORACLE_PRICE_SCALE = 10n ** 36n;

export function mulDivDown(x: bigint, y: bigint, d: bigint): bigint {
    return (x * y) / d;
}

export function mulDivUp(x: bigint, y: bigint, d: bigint): bigint {
    return (x * y + (d - 1n)) / d;
}

export function wMulDown(x: bigint, y: bigint): bigint {
    return mulDivDown(x, y, WAD);
}

export function wDivDown(x: bigint, y: bigint): bigint {
    return mulDivDown(x, WAD, y);
}

export function wDivUp(x: bigint, y: bigint): bigint {
    return mulDivUp(x, WAD, y);
}

// Signed variant, truncates toward zero
export function wMulToZero(x: bigint, y: bigint): bigint {
    return (x * y) / WAD;
}

export function wDivToZero(x: bigint, y: bigint): bigint {
    return (x * WAD) / y;
}

export function zeroFloorSub(x: bigint, y: bigint): bigint {
    return x > y ? x - y : 0n;
}

export function min(x: bigint, y: bigint): bigint {
    return x < y ? x : y;
}

export function max(x: bigint, y: bigint): bigint {
    return x > y ? x : y;
}

export function clamp(x: bigint, low: bigint, high: bigint): bigint {
    return max(low, min(x, high));
}
