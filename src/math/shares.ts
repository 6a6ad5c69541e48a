import { mulDivDown, mulDivUp } from "./fixed";

// Offsets applied to both totals in every conversion.
export const VIRTUAL_SHARES = 10n ** 6n;
export const VIRTUAL_ASSETS = 1n;

/// @dev Calculates the value of `assets` quoted in shares, rounding down.
export function toSharesDown(assets: bigint, totalAssets: bigint, totalShares: bigint): bigint {
    return mulDivDown(assets, totalShares + VIRTUAL_SHARES, totalAssets + VIRTUAL_ASSETS);
}

/// @dev Calculates the value of `assets` quoted in shares, rounding up.
export function toSharesUp(assets: bigint, totalAssets: bigint, totalShares: bigint): bigint {
    return mulDivUp(assets, totalShares + VIRTUAL_SHARES, totalAssets + VIRTUAL_ASSETS);
}

/// @dev Calculates the value of `shares` quoted in assets, rounding down.
export function toAssetsDown(shares: bigint, totalAssets: bigint, totalShares: bigint): bigint {
    return mulDivDown(shares, totalAssets + VIRTUAL_ASSETS, totalShares + VIRTUAL_SHARES);
}

/// @dev Calculates the value of `shares` quoted in assets, rounding up.
export function toAssetsUp(shares: bigint, totalAssets: bigint, totalShares: bigint): bigint {
    return mulDivUp(shares, totalAssets + VIRTUAL_ASSETS, totalShares + VIRTUAL_SHARES);
}
