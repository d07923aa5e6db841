/**
 * Length and character-set check for names. With `allowedChars`, every character must be in it.
 */
export default function validateString(
    value: unknown,
    maxLength: number = Number.MAX_SAFE_INTEGER,
    minLength = 0,
    allowedChars?: string
): value is string {
    if (typeof value !== 'string' || value.length > maxLength || value.length < minLength) {
        return false;
    }
    return !allowedChars || [...value].every(ch => allowedChars.includes(ch));
}
