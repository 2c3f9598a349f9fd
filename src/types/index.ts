export type Sex = 'M' | 'F';

export type CodiceFiscaleErrorCode =
    | 'invalid-format'
    | 'cannot-decode-birthdate'
    | 'underage';

export type GenerationErrorCode =
    | 'invalid-surname'
    | 'invalid-name'
    | 'invalid-gender'
    | 'invalid-birth-place-code'
    | `generation-failed:${string}`;

export type PartitaIvaErrorCode = 'invalid-length' | 'invalid-check-digit';

export type CodiceFiscaleValidationOptions = {
    requireMinimumAge?: boolean;
    minimumAge?: number;
    referenceDate?: Date; // "today" for century resolution and age
};

export type CodiceFiscaleValidationResult = {
    readonly isValid: boolean;
    readonly errorCode?: CodiceFiscaleErrorCode;
    readonly formattedValue: string;
    readonly birthdate?: string; // YYYY-MM-DD
    readonly age?: number;
    readonly sex?: Sex;
    readonly birthPlaceCode?: string;
    readonly birthPlaceName?: string;
    readonly birthPlaceProvince?: string;
    readonly isForeignBorn?: boolean;
};

export type PersonalRecord = {
    surname: string;
    givenName: string;
    birthdate: Date;
    sex: string; // M or F, anything else is rejected
    birthPlaceCode: string;
};

export type CodiceFiscaleGenerationResult = {
    readonly isValid: boolean;
    readonly errorCode?: GenerationErrorCode;
    readonly codiceFiscale?: string;
};

export type PartitaIvaValidationResult = {
    readonly isValid: boolean;
    readonly errorCode?: PartitaIvaErrorCode;
    readonly formattedValue: string;
    readonly officeCode?: string;
    readonly isTemporary?: boolean;
};

export type Municipality = {
    code: string;
    name: string;
    province: string; // EE for foreign states
};
