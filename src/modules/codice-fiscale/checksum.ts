import {
    CF_EVEN_VALUES,
    CF_ODD_VALUES,
    CF_OMOCODIA_CHARS,
    CF_OMOCODIA_DIGITS,
    CONTROL_CHARS,
    OMOCODIA_POSITIONS,
} from './tables';

/**
 * Replaces omocodia letters with their digits at the seven digit-bearing
 * positions. Any other character is left as is.
 */
export function decodeOmocodia(cf: string): string {
    const chars = cf.split('');
    for (const pos of OMOCODIA_POSITIONS) {
        const digit = CF_OMOCODIA_CHARS[chars[pos]];
        if (digit !== undefined) {
            chars[pos] = digit;
        }
    }
    return chars.join('');
}

/**
 * Substitutes the digit at `pos` with its omocodia letter.
 * Positions already holding a letter are returned unchanged.
 */
export function encodeOmocodiaAt(cf: string, pos: number): string {
    const letter = CF_OMOCODIA_DIGITS[cf[pos]];
    if (letter === undefined) return cf;
    return cf.substring(0, pos) + letter + cf.substring(pos + 1);
}

/**
 * Check character over the first 15 characters, computed on the
 * omocodia-decoded form.
 */
export function computeCheckCharacter(partial: string): string {
    const decoded = decodeOmocodia(partial.substring(0, 15));
    let sum = 0;
    for (let i = 0; i < decoded.length; i++) {
        const char = decoded[i];
        if (i % 2 === 0) { // Odd Position (1st, 3rd...) -> Index 0, 2...
            sum += CF_ODD_VALUES[char] ?? 0;
        } else { // Even Position (2nd, 4th...) -> Index 1, 3...
            sum += CF_EVEN_VALUES[char] ?? 0;
        }
    }
    return CONTROL_CHARS[sum % 26];
}
