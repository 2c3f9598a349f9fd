/**
 * 🔢 Italian P.IVA Validator
 *
 * 11 digits: matricola (7) + provincial office code (3) + check digit.
 * The check digit makes the Luhn-style sum over all 11 digits a multiple of 10.
 */
import { PartitaIvaErrorCode, PartitaIvaValidationResult } from '../../types';
import { logger } from '../observability';

/**
 * Luhn variant: even indexes add the digit, odd indexes add the doubled
 * digit (minus 9 when it reaches 10). Valid when the total is 0 mod 10.
 */
export function luhnSum(digits: string): number {
    let total = 0;
    for (let i = 0; i < digits.length; i++) {
        const d = Number(digits[i]);
        if (i % 2 === 0) {
            total += d;
        } else {
            let val = d * 2;
            if (val >= 10) val -= 9;
            total += val;
        }
    }
    return total;
}

export class PartitaIvaValidator {

    static clean(value: string): string {
        // Drops separators and any country prefix such as "IT"
        return value.replace(/\D/g, '');
    }

    static hasValidCheckDigit(piva: string): boolean {
        if (!/^\d{11}$/.test(piva)) return false;
        return luhnSum(piva) % 10 === 0;
    }

    validate(value: string): PartitaIvaValidationResult {
        const cleanValue = PartitaIvaValidator.clean(value);

        if (cleanValue.length !== 11) {
            return this.reject('invalid-length', cleanValue);
        }
        if (!PartitaIvaValidator.hasValidCheckDigit(cleanValue)) {
            return this.reject('invalid-check-digit', cleanValue);
        }

        return {
            isValid: true,
            formattedValue: cleanValue,
            officeCode: cleanValue.substring(7, 10),
            isTemporary: cleanValue.startsWith('99'),
        };
    }

    private reject(errorCode: PartitaIvaErrorCode, formattedValue: string): PartitaIvaValidationResult {
        logger.debug('Partita IVA rejected', { value: formattedValue, errorCode });
        return { isValid: false, errorCode, formattedValue };
    }
}

const validator = new PartitaIvaValidator();

export function validatePartitaIva(value: string): PartitaIvaValidationResult {
    return validator.validate(value);
}
