/**
 * Integer check for schedule indices, lock days and percentages.
 * Zero and negatives are refused unless allowed; `max` and `min` bound the range.
 */
const validateInteger = (
    value: unknown,
    canBeZero = false,
    canBeNegative = false,
    max: number = Number.MAX_SAFE_INTEGER,
    min: number = canBeNegative ? Number.MIN_SAFE_INTEGER : 0
): value is number =>
    typeof value === 'number' &&
    Number.isSafeInteger(value) &&
    (canBeZero || value !== 0) &&
    (canBeNegative || value >= 0) &&
    value >= min &&
    value <= max;

export default validateInteger;
