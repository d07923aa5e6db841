import config from '../config.js';

// Maximum expected length for any BigInt value we'll handle
// This allows for numbers up to 999,999,999,999,999,999,999,999,999,999 (30 digits)
const MAX_INTEGER_LENGTH = 32;

/**
 * Convert a value to BigInt, handling null, undefined, and zero-padded string inputs
 */
export function toBigInt(value: string | bigint | number | null | undefined): bigint {
    if (value === null || value === undefined) return BigInt(0);
    if (typeof value === 'bigint') return value;
    if (typeof value === 'number') return BigInt(Math.floor(value));
    const negative = value.startsWith('-');
    const digits = (negative ? value.slice(1) : value).replace(/^0+/, '') || '0';
    const parsed = BigInt(digits);
    return negative ? -parsed : parsed;
}

/**
 * Convert a value to a zero-padded string suitable for database storage.
 * Padding keeps lexicographical sorting in MongoDB consistent with numeric order.
 */
export function toDbString(value: number | string | bigint, padLength = MAX_INTEGER_LENGTH): string {
    const bigValue = toBigInt(value);
    const isNegative = bigValue < 0n;
    const absStr = (isNegative ? -bigValue : bigValue).toString();

    if (absStr.length > padLength) {
        throw new Error(`Value ${value} too large to fit in padLength=${padLength}`);
    }

    const padded = absStr.padStart(padLength, '0');
    return isNegative ? '-' + padded : padded;
}

/**
 * Format a minor-unit amount of the staked token with its decimal places
 */
export function formatTokenAmount(value: bigint, decimals: number = config.stakingTokenPrecision): string {
    const isNegative = value < 0n;
    const str = (isNegative ? -value : value).toString().padStart(decimals + 1, '0');
    const integerPart = str.slice(0, str.length - decimals) || '0';
    const decimalPart = str.slice(str.length - decimals).replace(/0+$/, '');
    const formatted = decimalPart ? `${integerPart}.${decimalPart}` : integerPart;
    return isNegative ? `-${formatted}` : formatted;
}
