import { BIGINT_0, MAX_INTEGER_BIGINT } from './arithmetic';

/** Balance amounts, always in Wei */
export type Wei = bigint;

const ETH_TO_WEI = BigInt(10) ** BigInt(18);

/** Converts an ETH amount to Wei. Returns null when the result would not fit in a word */
export function weiFromEth(amount: bigint): Wei | null {
    return checkedMul(amount, ETH_TO_WEI);
}

export function checkedAdd(a: Wei, b: Wei): Wei | null {
    const r = a + b;
    return r > MAX_INTEGER_BIGINT ? null : r;
}

export function checkedSub(a: Wei, b: Wei): Wei | null {
    const r = a - b;
    return r < BIGINT_0 ? null : r;
}

function checkedMul(a: Wei, b: Wei): Wei | null {
    const r = a * b;
    return r > MAX_INTEGER_BIGINT ? null : r;
}

export function formatWei(value: Wei): string {
    const whole = value / ETH_TO_WEI;
    const frac = (value % ETH_TO_WEI).toString().padStart(18, '0').replace(/0+$/, '');
    return frac ? `${whole}.${frac} ETH` : `${whole} ETH`;
}
