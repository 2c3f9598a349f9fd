/**
 * Codice Fiscale lookup tables.
 * These are fixed by the issuing authority; do not derive them.
 */

// Minimum age for adult-only checks
export const MINIMUM_AGE_YEARS = 18;

// Character values for Odd positions (1st, 3rd... -> index 0, 2...)
export const CF_ODD_VALUES: Readonly<Record<string, number>> = {
    '0': 1, '1': 0, '2': 5, '3': 7, '4': 9, '5': 13, '6': 15, '7': 17, '8': 19, '9': 21,
    'A': 1, 'B': 0, 'C': 5, 'D': 7, 'E': 9, 'F': 13, 'G': 15, 'H': 17, 'I': 19, 'J': 21,
    'K': 2, 'L': 4, 'M': 18, 'N': 20, 'O': 11, 'P': 3, 'Q': 6, 'R': 8, 'S': 12, 'T': 14,
    'U': 16, 'V': 10, 'W': 22, 'X': 25, 'Y': 24, 'Z': 23
};

// Character values for Even positions (2nd, 4th... -> index 1, 3...)
export const CF_EVEN_VALUES: Readonly<Record<string, number>> = {
    '0': 0, '1': 1, '2': 2, '3': 3, '4': 4, '5': 5, '6': 6, '7': 7, '8': 8, '9': 9,
    'A': 0, 'B': 1, 'C': 2, 'D': 3, 'E': 4, 'F': 5, 'G': 6, 'H': 7, 'I': 8, 'J': 9,
    'K': 10, 'L': 11, 'M': 12, 'N': 13, 'O': 14, 'P': 15, 'Q': 16, 'R': 17, 'S': 18, 'T': 19,
    'U': 20, 'V': 21, 'W': 22, 'X': 23, 'Y': 24, 'Z': 25
};

export const CONTROL_CHARS = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ';

// A=January ... T=December
export const CF_MONTH_CODES: Readonly<Record<string, number>> = {
    'A': 1, 'B': 2, 'C': 3, 'D': 4, 'E': 5, 'H': 6,
    'L': 7, 'M': 8, 'P': 9, 'R': 10, 'S': 11, 'T': 12
};

export const CF_MONTH_CODES_REVERSE: Readonly<Record<number, string>> = Object.fromEntries(
    Object.entries(CF_MONTH_CODES).map(([letter, month]) => [month, letter])
);

// Omocodia letter -> digit
export const CF_OMOCODIA_CHARS: Readonly<Record<string, string>> = {
    'L': '0', 'M': '1', 'N': '2', 'P': '3', 'Q': '4',
    'R': '5', 'S': '6', 'T': '7', 'U': '8', 'V': '9'
};

// Omocodia digit -> letter
export const CF_OMOCODIA_DIGITS: Readonly<Record<string, string>> = Object.fromEntries(
    Object.entries(CF_OMOCODIA_CHARS).map(([letter, digit]) => [digit, letter])
);

// 0-indexed positions that may hold an omocodia letter instead of a digit
export const OMOCODIA_POSITIONS: readonly number[] = [6, 7, 9, 10, 12, 13, 14];

// 6 letters, 2 alnum, 1 letter, 2 alnum, 1 letter, 3 alnum, 1 letter
export const CF_PATTERN = /^[A-Z]{6}[A-Z0-9]{2}[A-Z][A-Z0-9]{2}[A-Z][A-Z0-9]{3}[A-Z]$/;

export const VOWELS = 'AEIOU';
