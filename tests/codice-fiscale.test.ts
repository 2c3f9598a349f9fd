import { describe, expect, it } from 'vitest';
import {
    CodiceFiscaleValidator,
    CF_MONTH_CODES,
    computeCheckCharacter,
    decodeOmocodia,
    resolveCentury,
    validateCodiceFiscale,
} from '../src/modules/codice-fiscale';
import { MunicipalityDirectory } from '../src/modules/municipality';

// Pin "today" so century and age checks don't drift
const TODAY = new Date(2026, 9, 19);

describe('validateCodiceFiscale', () => {
    describe('valid codes', () => {
        it('decodes a male code born in Rome', () => {
            const result = validateCodiceFiscale('RSSMRA85M01H501Q', { referenceDate: TODAY });
            expect(result).toEqual({
                isValid: true,
                formattedValue: 'RSSMRA85M01H501Q',
                birthdate: '1985-08-01',
                age: 41,
                sex: 'M',
                birthPlaceCode: 'H501',
                birthPlaceName: 'ROMA',
                birthPlaceProvince: 'RM',
                isForeignBorn: false,
            });
        });

        it('decodes a female code (day + 40)', () => {
            const result = validateCodiceFiscale('RSSMRA85M41H501U', { referenceDate: TODAY });
            expect(result.isValid).toBe(true);
            expect(result.birthdate).toBe('1985-08-01');
            expect(result.sex).toBe('F');
        });

        it('subtracts 40 from female days past the 10th', () => {
            const result = validateCodiceFiscale('RSSMRA85M55H501I', { referenceDate: TODAY });
            expect(result.birthdate).toBe('1985-08-15');
            expect(result.sex).toBe('F');
        });

        it('accepts lowercase input and embedded spaces', () => {
            expect(validateCodiceFiscale('rssmra85m01h501q').formattedValue).toBe('RSSMRA85M01H501Q');
            expect(validateCodiceFiscale('  RSS MRA 85M01 H501Q ').formattedValue).toBe('RSSMRA85M01H501Q');
            expect(validateCodiceFiscale('RSS MRA 85M01 H501Q').isValid).toBe(true);
        });

        it('is insensitive to case and whitespace', () => {
            const raw = ' rss mra85m41\th501u ';
            expect(validateCodiceFiscale(raw, { referenceDate: TODAY }))
                .toEqual(validateCodiceFiscale('RSSMRA85M41H501U', { referenceDate: TODAY }));
        });

        it('reads January and December month letters', () => {
            expect(validateCodiceFiscale('RSSMRA85A01H501Z', { referenceDate: TODAY }).birthdate).toBe('1985-01-01');
            expect(validateCodiceFiscale('RSSMRA85T01H501M', { referenceDate: TODAY }).birthdate).toBe('1985-12-01');
        });

        it('accepts 29 February in a leap year', () => {
            expect(validateCodiceFiscale('RSSMRA00B29H501Y', { referenceDate: TODAY }).birthdate).toBe('2000-02-29');
        });
    });

    describe('birth place', () => {
        it('flags foreign-born codes and resolves the country', () => {
            const result = validateCodiceFiscale('RSSMRA85M01Z109Q', { referenceDate: TODAY });
            expect(result.isValid).toBe(true);
            expect(result.birthPlaceCode).toBe('Z109');
            expect(result.birthPlaceName).toBe('FRANCIA');
            expect(result.birthPlaceProvince).toBe('EE');
            expect(result.isForeignBorn).toBe(true);
        });

        it('keeps the code when the directory has no entry', () => {
            const result = validateCodiceFiscale('RSSMRA85M01X999S', { referenceDate: TODAY });
            expect(result.isValid).toBe(true);
            expect(result.birthPlaceCode).toBe('X999');
            expect(result.birthPlaceName).toBeUndefined();
            expect(result.birthPlaceProvince).toBeUndefined();
            expect(result.isForeignBorn).toBe(false);
        });

        it('uses the directory it was built with', () => {
            const validator = new CodiceFiscaleValidator(
                new MunicipalityDirectory([{ code: 'X999', name: 'TESTVILLE', province: 'TT' }])
            );
            const result = validator.validate('RSSMRA85M01X999S', { referenceDate: TODAY });
            expect(result.birthPlaceName).toBe('TESTVILLE');
            expect(result.birthPlaceProvince).toBe('TT');
        });
    });

    describe('invalid format', () => {
        it('rejects a code one character short', () => {
            expect(validateCodiceFiscale('RSSMRA85M01H501')).toEqual({
                isValid: false,
                errorCode: 'invalid-format',
                formattedValue: 'RSSMRA85M01H501',
            });
        });

        it('rejects digits where letters belong', () => {
            expect(validateCodiceFiscale('123456789012345A').errorCode).toBe('invalid-format');
        });

        it('rejects empty input', () => {
            expect(validateCodiceFiscale('')).toEqual({ isValid: false, errorCode: 'invalid-format', formattedValue: '' });
        });

        it('rejects every wrong check character with invalid-format', () => {
            for (const letter of 'ABCDEFGHIJKLMNOPRSTUVWXYZ') {
                const result = validateCodiceFiscale(`RSSMRA85M01H501${letter}`);
                expect(result.isValid).toBe(false);
                expect(result.errorCode).toBe('invalid-format');
            }
        });

        it('never throws on odd input', () => {
            for (const raw of ['!!!!!!!!!!!!!!!!', '0000000000000000', 'ÀÈÌÒÙÀÈÌÒÙÀÈÌÒÙÀ', '\n\t', 'x'.repeat(200)]) {
                expect(() => validateCodiceFiscale(raw)).not.toThrow();
                expect(validateCodiceFiscale(raw).isValid).toBe(false);
            }
        });
    });

    describe('birthdate decoding', () => {
        it('rejects a letter that is not a month code', () => {
            expect(validateCodiceFiscale('RSSMRA85F01H501L', { referenceDate: TODAY })).toEqual({
                isValid: false,
                errorCode: 'cannot-decode-birthdate',
                formattedValue: 'RSSMRA85F01H501L',
            });
        });

        it('rejects 30 February', () => {
            expect(validateCodiceFiscale('RSSMRA85B30H501C', { referenceDate: TODAY }).errorCode)
                .toBe('cannot-decode-birthdate');
        });

        it('rejects 29 February outside leap years', () => {
            expect(validateCodiceFiscale('RSSMRA01B29H501Z', { referenceDate: TODAY }).errorCode)
                .toBe('cannot-decode-birthdate');
        });

        it('rejects day zero', () => {
            expect(validateCodiceFiscale('RSSMRA85M00H501R', { referenceDate: TODAY }).errorCode)
                .toBe('cannot-decode-birthdate');
        });

        it('rejects a year holding a non-omocodia letter', () => {
            expect(validateCodiceFiscale('RSSMRA8AM01H501L', { referenceDate: TODAY }).errorCode)
                .toBe('cannot-decode-birthdate');
        });
    });

    describe('century resolution', () => {
        it('puts years above the current two digits in the 1900s', () => {
            expect(validateCodiceFiscale('RSSMRA90M01H501N', { referenceDate: TODAY }).birthdate).toBe('1990-08-01');
            expect(validateCodiceFiscale('RSSMRA27M01H501E', { referenceDate: TODAY }).birthdate).toBe('1927-08-01');
        });

        it('puts years up to the current two digits in the current century', () => {
            expect(validateCodiceFiscale('RSSMRA10M01H501S', { referenceDate: TODAY }).birthdate).toBe('2010-08-01');
            expect(validateCodiceFiscale('RSSMRA26M01H501D', { referenceDate: TODAY }).birthdate).toBe('2026-08-01');
        });

        it('follows the reference year', () => {
            const in2025 = new Date(2025, 0, 1);
            expect(resolveCentury(30, in2025)).toBe(1930);
            expect(resolveCentury(10, in2025)).toBe(2010);
            expect(resolveCentury(25, in2025)).toBe(2025);
        });
    });

    describe('age', () => {
        it('counts whole years up to the reference date', () => {
            expect(validateCodiceFiscale('RSSMRA85M01H501Q', { referenceDate: new Date(2026, 6, 31) }).age).toBe(40);
            expect(validateCodiceFiscale('RSSMRA85M01H501Q', { referenceDate: new Date(2026, 7, 1) }).age).toBe(41);
        });

        it('flags minors when the age gate is on', () => {
            const result = validateCodiceFiscale('RSSMRA20M01H501X', { requireMinimumAge: true, referenceDate: TODAY });
            expect(result).toEqual({
                isValid: false,
                errorCode: 'underage',
                formattedValue: 'RSSMRA20M01H501X',
                birthdate: '2020-08-01',
                age: 6,
                sex: 'M',
                birthPlaceCode: 'H501',
                birthPlaceName: 'ROMA',
                birthPlaceProvince: 'RM',
                isForeignBorn: false,
            });
        });

        it('ignores age unless asked', () => {
            expect(validateCodiceFiscale('RSSMRA20M01H501X', { referenceDate: TODAY }).isValid).toBe(true);
        });

        it('passes adults with the default minimum of 18', () => {
            const result = validateCodiceFiscale('RSSMRA85M01H501Q', { requireMinimumAge: true, referenceDate: TODAY });
            expect(result.isValid).toBe(true);
            expect(result.age).toBe(41);
        });

        it('honours a custom minimum age', () => {
            const result = validateCodiceFiscale('RSSMRA85M01H501Q', {
                requireMinimumAge: true,
                minimumAge: 50,
                referenceDate: TODAY,
            });
            expect(result.isValid).toBe(false);
            expect(result.errorCode).toBe('underage');
            expect(result.age).toBe(41);
        });
    });

    describe('omocodia', () => {
        it('maps substitute letters back to digits at the seven positions only', () => {
            expect(decodeOmocodia('RSSMRAURMLMHRLMQ')).toBe('RSSMRA85M01H501Q');
            // position 8 (month) and 15 (check) stay untouched
            expect(decodeOmocodia('RSSMRA85M01H501M')).toBe('RSSMRA85M01H501M');
        });

        it('computes the check character on the decoded form', () => {
            expect(computeCheckCharacter('RSSMRA85M01H501')).toBe('Q');
            expect(computeCheckCharacter('RSSMRA85M0MH50M')).toBe('Q');
        });

        it('validates a fully substituted code to the same person', () => {
            const result = validateCodiceFiscale('RSSMRAURMLMHRLMQ', { referenceDate: TODAY });
            expect(result.isValid).toBe(true);
            expect(result.birthdate).toBe('1985-08-01');
            expect(result.sex).toBe('M');
            expect(result.birthPlaceCode).toBe('H501');
            expect(result.birthPlaceName).toBe('ROMA');
        });

        it('validates partial substitutions', () => {
            for (const cf of ['RSSMRA85M01H50MQ', 'RSSMRA8RM01H501Q', 'RSSMRA85MLMH501Q', 'RSSMRAU5M41H5L1U']) {
                expect(validateCodiceFiscale(cf, { referenceDate: TODAY }).isValid).toBe(true);
            }
        });
    });

    it('exposes the month alphabet', () => {
        expect(CF_MONTH_CODES).toEqual({
            A: 1, B: 2, C: 3, D: 4, E: 5, H: 6, L: 7, M: 8, P: 9, R: 10, S: 11, T: 12,
        });
    });
});
