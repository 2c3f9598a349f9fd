/**
 * 🇮🇹 MUNICIPALITY DIRECTORY 🇮🇹
 * Cadastral code (codice catastale) -> municipality name and province.
 *
 * The bundled table is a subset: regional and provincial capitals, other
 * large municipalities, and foreign states (Z codes, province "EE").
 */
import { z } from 'zod';
import { Municipality } from '../../types';
import rawMunicipalities from './municipalities.json';

const MunicipalitySchema = z.object({
    code: z.string().length(4).transform(code => code.toUpperCase()),
    name: z.string().min(1).transform(name => name.toUpperCase()),
    province: z.string().length(2),
});

const MunicipalityTableSchema = z.array(MunicipalitySchema);

export const FOREIGN_PROVINCE = 'EE';

export class MunicipalityDirectory {
    private readonly byCode = new Map<string, Municipality>();

    constructor(entries: readonly Municipality[]) {
        for (const entry of entries) {
            this.byCode.set(entry.code.toUpperCase(), { ...entry, code: entry.code.toUpperCase() });
        }
    }

    /**
     * Parses and validates a raw table (e.g. a JSON file) into a directory.
     */
    static fromTable(raw: unknown): MunicipalityDirectory {
        return new MunicipalityDirectory(MunicipalityTableSchema.parse(raw));
    }

    get size(): number {
        return this.byCode.size;
    }

    lookup(code: string): Pick<Municipality, 'name' | 'province'> | undefined {
        const entry = this.byCode.get(code.trim().toUpperCase());
        return entry ? { name: entry.name, province: entry.province } : undefined;
    }

    /**
     * Exact, case-insensitive name match. Use search() for partial names.
     */
    reverseLookup(name: string): string | undefined {
        const wanted = name.trim().toUpperCase();
        for (const entry of this.byCode.values()) {
            if (entry.name === wanted) return entry.code;
        }
        return undefined;
    }

    search(partialName: string): Municipality[] {
        const wanted = partialName.trim().toUpperCase();
        return [...this.byCode.values()]
            .filter(entry => entry.name.includes(wanted))
            .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    }

    isForeign(code: string): boolean {
        return isForeignCountry(code);
    }
}

export function isForeignCountry(code: string): boolean {
    return code.trim().toUpperCase().startsWith('Z');
}

// Read-only after construction
export const municipalities = MunicipalityDirectory.fromTable(rawMunicipalities);

export function getMunicipalityInfo(code: string): Pick<Municipality, 'name' | 'province'> | undefined {
    return municipalities.lookup(code);
}

export function getCadastralCode(name: string): string | undefined {
    return municipalities.reverseLookup(name);
}

export function searchMunicipality(partialName: string): Municipality[] {
    return municipalities.search(partialName);
}
