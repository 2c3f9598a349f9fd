#!/usr/bin/env node
import fs from 'fs';
import path from 'path';
import { Command, CommanderError, InvalidArgumentError } from 'commander';
import { z } from 'zod';
import { Config, loadConfig } from './config';
import { configureLogger, logger } from './modules/observability';
import { generateCodiceFiscale, validateCodiceFiscale } from './modules/codice-fiscale';
import { validatePartitaIva } from './modules/partita-iva';
import { FOREIGN_PROVINCE, getCadastralCode, searchMunicipality } from './modules/municipality';
import { errorMessage } from './utils/errors';

const PackageSchema = z.object({ version: z.string() });

function readVersion(): string {
    const raw: unknown = JSON.parse(fs.readFileSync(path.join(__dirname, '../package.json'), 'utf8'));
    return PackageSchema.parse(raw).version;
}

function parseNonNegativeInt(value: string): number {
    const n = Number(value);
    if (!Number.isInteger(n) || n < 0) {
        throw new InvalidArgumentError('Expected a non-negative integer.');
    }
    return n;
}

function parsePositiveInt(value: string): number {
    const n = parseNonNegativeInt(value);
    if (n < 1) {
        throw new InvalidArgumentError('Expected a positive integer.');
    }
    return n;
}

/**
 * Strict YYYY-MM-DD to a local-time Date, or null.
 */
export function parseIsoDate(value: string): Date | null {
    const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value.trim());
    if (!match) return null;
    const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
    const date = new Date(year, month - 1, day);
    if (date.getFullYear() !== year || date.getMonth() !== month - 1 || date.getDate() !== day) {
        return null;
    }
    return date;
}

type ValidateCfOptions = { checkAdult: boolean, minimumAge: number };

function validateCfCommand(value: string, options: ValidateCfOptions): number {
    const result = validateCodiceFiscale(value, {
        requireMinimumAge: options.checkAdult,
        minimumAge: options.minimumAge,
    });

    if (!result.isValid) {
        console.log(`✗ Invalid Codice Fiscale: ${result.formattedValue}`);
        console.log(`  Error: ${result.errorCode}`);
        if (result.birthdate) console.log(`  Birthdate: ${result.birthdate}`);
        if (result.age !== undefined) console.log(`  Age: ${result.age}`);
        return 1;
    }

    console.log(`✓ Valid Codice Fiscale: ${result.formattedValue}`);
    console.log(`  Birthdate: ${result.birthdate}`);
    console.log(`  Age: ${result.age}`);
    console.log(`  Sex: ${result.sex}`);
    if (result.birthPlaceName) {
        const province = result.birthPlaceProvince && result.birthPlaceProvince !== FOREIGN_PROVINCE
            ? ` (${result.birthPlaceProvince})`
            : '';
        console.log(`  Birth place: ${result.birthPlaceName}${province}`);
        if (result.isForeignBorn) console.log('  (Foreign country)');
    } else {
        console.log(`  Birth place code: ${result.birthPlaceCode}`);
    }
    return 0;
}

function validatePivaCommand(value: string): number {
    const result = validatePartitaIva(value);

    if (!result.isValid) {
        console.log(`✗ Invalid Partita IVA: ${result.formattedValue}`);
        console.log(`  Error: ${result.errorCode}`);
        return 1;
    }

    console.log(`✓ Valid Partita IVA: ${result.formattedValue}`);
    console.log(`  Office code: ${result.officeCode}`);
    if (result.isTemporary) console.log('  ⚠ Temporary VAT number');
    return 0;
}

type GenerateCfOptions = {
    surname: string;
    name: string;
    birthdate: string;
    gender: string;
    birthPlaceCode?: string;
    birthPlace?: string;
};

function resolveBirthPlace(options: GenerateCfOptions): string | null {
    if (options.birthPlaceCode) return options.birthPlaceCode;

    if (!options.birthPlace) {
        console.log('✗ Birth place code is required');
        console.log('  Use --birth-place-code or --birth-place');
        return null;
    }

    const code = getCadastralCode(options.birthPlace);
    if (code) return code;

    const matches = searchMunicipality(options.birthPlace);
    if (matches.length === 0) {
        console.log(`✗ Municipality not found: ${options.birthPlace}`);
        return null;
    }

    console.log(`✗ Multiple municipalities found for '${options.birthPlace}':`);
    for (const m of matches.slice(0, 10)) {
        console.log(`  ${m.code}: ${m.name} (${m.province})`);
    }
    console.log('  Use --birth-place-code with the exact code');
    return null;
}

function generateCfCommand(options: GenerateCfOptions): number {
    const birthdate = parseIsoDate(options.birthdate);
    if (!birthdate) {
        console.log(`✗ Invalid birthdate format: ${options.birthdate}`);
        console.log('  Use YYYY-MM-DD format (e.g., 1985-08-01)');
        return 1;
    }

    const gender = options.gender.trim().toUpperCase();
    if (gender !== 'M' && gender !== 'F') {
        console.log(`✗ Invalid gender: ${options.gender}`);
        console.log('  Use M for male or F for female');
        return 1;
    }

    const birthPlaceCode = resolveBirthPlace(options);
    if (!birthPlaceCode) return 1;

    const result = generateCodiceFiscale({
        surname: options.surname,
        givenName: options.name,
        birthdate,
        sex: gender,
        birthPlaceCode,
    });

    if (!result.isValid) {
        console.log('✗ Failed to generate Codice Fiscale');
        console.log(`  Error: ${result.errorCode}`);
        return 1;
    }

    console.log(`✓ Generated Codice Fiscale: ${result.codiceFiscale}`);
    return 0;
}

function searchMunicipalityCommand(query: string, options: { limit: number }): number {
    const results = searchMunicipality(query);

    if (results.length === 0) {
        console.log(`✗ No municipalities found for '${query}'`);
        return 1;
    }

    console.log(`Found ${results.length} municipalities:`);
    for (const m of results.slice(0, options.limit)) {
        const province = m.province !== FOREIGN_PROVINCE ? ` (${m.province})` : ' (Foreign)';
        console.log(`  ${m.code}: ${m.name}${province}`);
    }
    if (results.length > options.limit) {
        console.log(`  ... and ${results.length - options.limit} more`);
    }
    return 0;
}

export function buildProgram(config: Config, setExitCode: (code: number) => void): Command {
    const program = new Command();

    program
        .name('it-fiscal')
        .description('Validate and generate Italian tax identification numbers')
        .version(readVersion())
        .exitOverride();

    program
        .command('validate-cf')
        .description('Validate an Italian Codice Fiscale (personal tax ID)')
        .argument('<value>', 'Codice Fiscale to validate')
        .option('--check-adult', 'Verify that the person is at least minimum-age years old',
            config.codice_fiscale.require_minimum_age)
        .option('--no-check-adult', 'Skip the minimum age check even when the config enables it')
        .option('--minimum-age <n>', 'Minimum age required', parseNonNegativeInt,
            config.codice_fiscale.minimum_age)
        .action((value: string, options: ValidateCfOptions) => {
            setExitCode(validateCfCommand(value, options));
        });

    program
        .command('validate-piva')
        .description('Validate an Italian Partita IVA (VAT number)')
        .argument('<value>', 'Partita IVA to validate')
        .action((value: string) => {
            setExitCode(validatePivaCommand(value));
        });

    program
        .command('generate-cf')
        .description('Generate an Italian Codice Fiscale from personal data')
        .requiredOption('--surname <surname>', "Person's surname")
        .requiredOption('--name <name>', "Person's first name")
        .requiredOption('--birthdate <date>', 'Date of birth (YYYY-MM-DD format)')
        .requiredOption('--gender <gender>', 'Gender (M for male, F for female)')
        .option('--birth-place-code <code>', '4-character cadastral code (e.g., H501 for Rome)')
        .option('--birth-place <name>', 'Municipality name (alternative to --birth-place-code)')
        .action((options: GenerateCfOptions) => {
            setExitCode(generateCfCommand(options));
        });

    program
        .command('search-municipality')
        .description('Search for Italian municipality cadastral codes')
        .argument('<query>', 'Municipality name to search for')
        .option('--limit <n>', 'Maximum number of results', parsePositiveInt,
            config.municipality.search_limit)
        .action((query: string, options: { limit: number }) => {
            setExitCode(searchMunicipalityCommand(query, options));
        });

    return program;
}

/**
 * Runs the CLI on user arguments (no node/script prefix) and returns the exit code.
 */
export function main(argv: string[], configPath?: string): number {
    let config: Config;
    try {
        config = loadConfig(configPath);
    } catch (e) {
        logger.error('Fatal Error: cannot load configuration', { error: errorMessage(e) });
        return 1;
    }
    configureLogger(config.logging);

    let exitCode = 0;
    const program = buildProgram(config, code => { exitCode = code; });

    if (argv.length === 0) {
        program.outputHelp();
        return 0;
    }

    try {
        program.parse(argv, { from: 'user' });
    } catch (e) {
        if (e instanceof CommanderError) {
            return e.exitCode;
        }
        logger.error('Fatal Error', { error: errorMessage(e) });
        return 1;
    }
    return exitCode;
}

if (require.main === module) {
    process.exitCode = main(process.argv.slice(2));
}
