/**
 * 🪪 Codice Fiscale Validator
 *
 * Checks structure and check character, then decodes birthdate, sex and
 * birth place. Omocodia letters are accepted at every digit position.
 */
import {
    CodiceFiscaleErrorCode,
    CodiceFiscaleValidationOptions,
    CodiceFiscaleValidationResult,
    Sex,
} from '../../types';
import { logger } from '../observability';
import { isForeignCountry, MunicipalityDirectory, municipalities } from '../municipality';
import { computeCheckCharacter, decodeOmocodia } from './checksum';
import { CF_MONTH_CODES, CF_PATTERN, MINIMUM_AGE_YEARS } from './tables';

export type DecodedBirth = {
    year: number;
    month: number;
    day: number;
    sex: Sex;
};

const pad2 = (n: number): string => String(n).padStart(2, '0');

export function formatIsoDate(year: number, month: number, day: number): string {
    return `${String(year).padStart(4, '0')}-${pad2(month)}-${pad2(day)}`;
}

/**
 * Whole years between the birth date and `today`, using local calendar fields.
 */
export function calculateAge(birth: Pick<DecodedBirth, 'year' | 'month' | 'day'>, today: Date): number {
    const month = today.getMonth() + 1;
    const day = today.getDate();
    const beforeBirthday = month < birth.month || (month === birth.month && day < birth.day);
    return today.getFullYear() - birth.year - (beforeBirthday ? 1 : 0);
}

/**
 * Two-digit years above the current year's last two digits belong to the
 * 1900s; the rest to the current century.
 */
export function resolveCentury(twoDigitYear: number, today: Date): number {
    const currentYear = today.getFullYear();
    const currentCentury = Math.floor(currentYear / 100) * 100;
    return twoDigitYear > currentYear % 100 ? 1900 + twoDigitYear : currentCentury + twoDigitYear;
}

function isCalendarDate(year: number, month: number, day: number): boolean {
    if (month < 1 || month > 12 || day < 1) return false;
    const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
    return day <= daysInMonth;
}

export class CodiceFiscaleValidator {

    constructor(private readonly directory: MunicipalityDirectory = municipalities) { }

    static clean(value: string): string {
        return value.trim().toUpperCase().replace(/\s+/g, '');
    }

    static hasValidFormat(cf: string): boolean {
        return cf.length === 16 && CF_PATTERN.test(cf);
    }

    static hasValidCheckCharacter(cf: string): boolean {
        return computeCheckCharacter(cf.substring(0, 15)) === cf[15];
    }

    /**
     * Birthdate and sex from positions 6-10, or null when they don't
     * form a real calendar date.
     */
    static decodeBirth(cf: string, today: Date = new Date()): DecodedBirth | null {
        const decoded = decodeOmocodia(cf);

        const yearDigits = decoded.substring(6, 8);
        const dayDigits = decoded.substring(9, 11);
        if (!/^\d{2}$/.test(yearDigits) || !/^\d{2}$/.test(dayDigits)) return null;

        const month = CF_MONTH_CODES[decoded[8]];
        if (month === undefined) return null;

        const year = resolveCentury(parseInt(yearDigits, 10), today);

        let day = parseInt(dayDigits, 10);
        let sex: Sex = 'M';
        if (day > 40) {
            day -= 40;
            sex = 'F';
        }

        if (!isCalendarDate(year, month, day)) return null;
        return { year, month, day, sex };
    }

    validate(value: string, options: CodiceFiscaleValidationOptions = {}): CodiceFiscaleValidationResult {
        const cleanValue = CodiceFiscaleValidator.clean(value);
        const today = options.referenceDate ?? new Date();
        const minimumAge = options.minimumAge ?? MINIMUM_AGE_YEARS;

        // 1. Structure, then check character. Both surface as invalid-format.
        if (!CodiceFiscaleValidator.hasValidFormat(cleanValue) ||
            !CodiceFiscaleValidator.hasValidCheckCharacter(cleanValue)) {
            return this.reject('invalid-format', cleanValue);
        }

        // 2. Birthdate and sex
        const birth = CodiceFiscaleValidator.decodeBirth(cleanValue, today);
        if (!birth) {
            return this.reject('cannot-decode-birthdate', cleanValue);
        }
        const age = calculateAge(birth, today);

        // 3. Birth place (foreign flag holds even for codes missing from the directory)
        const birthPlaceCode = decodeOmocodia(cleanValue).substring(11, 15);
        const place = this.directory.lookup(birthPlaceCode);

        const details = {
            formattedValue: cleanValue,
            birthdate: formatIsoDate(birth.year, birth.month, birth.day),
            age,
            sex: birth.sex,
            birthPlaceCode,
            birthPlaceName: place?.name,
            birthPlaceProvince: place?.province,
            isForeignBorn: isForeignCountry(birthPlaceCode),
        };

        // 4. Age gate
        if (options.requireMinimumAge && age < minimumAge) {
            logger.debug('Codice fiscale below minimum age', { value: cleanValue, age, minimumAge });
            return { isValid: false, errorCode: 'underage', ...details };
        }

        return { isValid: true, ...details };
    }

    private reject(errorCode: CodiceFiscaleErrorCode, formattedValue: string): CodiceFiscaleValidationResult {
        logger.debug('Codice fiscale rejected', { value: formattedValue, errorCode });
        return { isValid: false, errorCode, formattedValue };
    }
}
