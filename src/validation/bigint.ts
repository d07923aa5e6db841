import config from '../config.js';
import { toBigInt } from '../utils/bigint.js';

const maxValue: bigint = toBigInt(config.maxValue);

/**
 * Validates an amount given as a decimal string or bigint
 * @param value - The value to validate
 * @param allowZero - Whether to allow zero value
 * @param allowNegative - Whether to allow negative values
 * @param minValue - Optional minimum value
 * @returns boolean indicating if value meets all constraints
 */
export default function validateBigInt(
    value: unknown,
    allowZero = false,
    allowNegative = false,
    minValue?: bigint
): value is string | bigint {
    let numValue: bigint;
    if (typeof value === 'bigint') {
        numValue = value;
    } else if (typeof value === 'string' && /^-?\d+$/.test(value)) {
        numValue = toBigInt(value);
    } else {
        return false;
    }

    if (!allowZero && numValue === toBigInt(0)) return false;
    if (!allowNegative && numValue < toBigInt(0)) return false;
    if (numValue > maxValue) return false;
    if (minValue !== undefined && numValue < minValue) return false;

    return true;
}
