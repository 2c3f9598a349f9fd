/**
 * 🏭 Codice Fiscale Generator
 *
 * Encodes surname, given name, birthdate, sex and birth place into a CF.
 * Errors come back as codes; nothing escapes generate().
 */
import { CodiceFiscaleGenerationResult, PersonalRecord, Sex } from '../../types';
import { EncodingError, errorMessage } from '../../utils/errors';
import { logger } from '../observability';
import { computeCheckCharacter, decodeOmocodia, encodeOmocodiaAt } from './checksum';
import { CodiceFiscaleValidator } from './validator';
import { CF_MONTH_CODES_REVERSE, OMOCODIA_POSITIONS, VOWELS } from './tables';

/**
 * Uppercase letters only, accents folded (Ò -> O).
 */
export function lettersOnly(value: string): string {
    return value
        .normalize('NFD')
        .replace(/[\u0300-\u036f]/g, '')
        .toUpperCase()
        .replace(/[^A-Z]/g, '');
}

function splitLetters(value: string): { consonants: string[], vowels: string[] } {
    const letters = lettersOnly(value).split('');
    return {
        consonants: letters.filter(c => !VOWELS.includes(c)),
        vowels: letters.filter(c => VOWELS.includes(c)),
    };
}

function fillCode(consonants: string[], vowels: string[]): string {
    return [...consonants, ...vowels, 'X', 'X', 'X'].slice(0, 3).join('');
}

export function encodeSurname(surname: string): string {
    const { consonants, vowels } = splitLetters(surname);
    return fillCode(consonants, vowels);
}

/**
 * With 4+ consonants the given name skips the 2nd one (1st, 3rd, 4th).
 */
export function encodeGivenName(givenName: string): string {
    const { consonants, vowels } = splitLetters(givenName);
    if (consonants.length >= 4) {
        return consonants[0] + consonants[2] + consonants[3];
    }
    return fillCode(consonants, vowels);
}

export function encodeBirth(birthdate: Date, sex: Sex): string {
    const year = birthdate.getFullYear();
    const monthLetter = CF_MONTH_CODES_REVERSE[birthdate.getMonth() + 1];
    if (Number.isNaN(year) || monthLetter === undefined) {
        throw new EncodingError('Invalid birthdate', { birthdate: String(birthdate) });
    }
    if (year < 0) {
        throw new EncodingError('Birth year out of range', { year });
    }

    const day = birthdate.getDate() + (sex === 'F' ? 40 : 0);
    const yearCode = String(year % 100).padStart(2, '0');
    return `${yearCode}${monthLetter}${String(day).padStart(2, '0')}`;
}

const BIRTH_PLACE_PATTERN = /^[A-Z0-9]{4}$/;

const isSex = (value: string): value is Sex => value === 'M' || value === 'F';

export class CodiceFiscaleGenerator {

    generate(record: PersonalRecord): CodiceFiscaleGenerationResult {
        if (!record.surname.trim()) {
            return { isValid: false, errorCode: 'invalid-surname' };
        }
        if (!record.givenName.trim()) {
            return { isValid: false, errorCode: 'invalid-name' };
        }
        const sex = record.sex.trim().toUpperCase();
        if (!isSex(sex)) {
            return { isValid: false, errorCode: 'invalid-gender' };
        }
        const birthPlaceCode = record.birthPlaceCode.trim().toUpperCase();
        if (!BIRTH_PLACE_PATTERN.test(birthPlaceCode)) {
            return { isValid: false, errorCode: 'invalid-birth-place-code' };
        }

        try {
            const partial = encodeSurname(record.surname)
                + encodeGivenName(record.givenName)
                + encodeBirth(record.birthdate, sex)
                + birthPlaceCode;
            return { isValid: true, codiceFiscale: partial + computeCheckCharacter(partial) };
        } catch (e) {
            logger.warn('Codice fiscale generation failed', { error: errorMessage(e) });
            return { isValid: false, errorCode: `generation-failed:${errorMessage(e)}` };
        }
    }

    /**
     * The seven omocodia variants of a valid CF, substituting digits
     * cumulatively from the rightmost position of its decoded form. Empty for invalid input.
     */
    static omocodes(value: string): string[] {
        const cf = CodiceFiscaleValidator.clean(value);
        if (!CodiceFiscaleValidator.hasValidFormat(cf) || !CodiceFiscaleValidator.hasValidCheckCharacter(cf)) {
            return [];
        }

        const variants: string[] = [];
        let current = decodeOmocodia(cf).substring(0, 15);
        for (const pos of [...OMOCODIA_POSITIONS].reverse()) {
            current = encodeOmocodiaAt(current, pos);
            variants.push(current + computeCheckCharacter(current));
        }
        return variants;
    }
}
