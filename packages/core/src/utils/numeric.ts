/**
 * Numeric text helpers shared by the field accessors.
 */

const INTEGER_PATTERN = /^[+-]?\d+$/;
const DIGITS_PATTERN = /^\d+$/;

/**
 * Parse a base-10 signed integer.
 *
 * Surrounding whitespace is ignored and a leading `+` or `-` is accepted.
 * Blank or otherwise non-numeric text returns null.
 *
 * @param text - Raw slice of a record line
 * @returns Parsed integer, or null if the text is not an integer
 */
export function parseInteger(text: string): number | null {
    const trimmed = text.trim();
    if (!INTEGER_PATTERN.test(trimmed)) {
        return null;
    }
    // `+ 0` folds "-0" into 0
    return Number(trimmed) + 0;
}

/**
 * True when every character is an ASCII digit (and there is at least one).
 */
export function isAllDigits(text: string): boolean {
    return DIGITS_PATTERN.test(text);
}
