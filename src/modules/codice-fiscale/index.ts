import {
    CodiceFiscaleGenerationResult,
    CodiceFiscaleValidationOptions,
    CodiceFiscaleValidationResult,
    PersonalRecord,
} from '../../types';
import { CodiceFiscaleGenerator } from './generator';
import { CodiceFiscaleValidator } from './validator';

export * from './tables';
export { computeCheckCharacter, decodeOmocodia } from './checksum';
export { CodiceFiscaleValidator, calculateAge, resolveCentury } from './validator';
export { CodiceFiscaleGenerator, encodeGivenName, encodeSurname } from './generator';

// Stateless, so one shared instance each is enough
const validator = new CodiceFiscaleValidator();
const generator = new CodiceFiscaleGenerator();

export function validateCodiceFiscale(
    value: string,
    options: CodiceFiscaleValidationOptions = {}
): CodiceFiscaleValidationResult {
    return validator.validate(value, options);
}

export function generateCodiceFiscale(record: PersonalRecord): CodiceFiscaleGenerationResult {
    return generator.generate(record);
}

export function generateOmocodes(value: string): string[] {
    return CodiceFiscaleGenerator.omocodes(value);
}
