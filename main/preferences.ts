import fs from 'node:fs';
import path from 'node:path';
import { decode, encode } from 'ini';
import { logDebug } from './logger.js';
import { getPreferencesPath } from './paths.js';

export type PreferenceValue = string | number | boolean;

type Sections = Map<string, Map<string, string>>;

const TOKEN = /^[A-Za-z0-9_-]+$/;

// ini drops this name on read, so a write under it could never be read back
const RESERVED = '__proto__';

export class PreferenceNotFoundError extends Error {
    readonly code = 'NotFound';
    readonly section: string;
    readonly option: string;

    constructor(section: string, option: string) {
        super(`No preference set for [${section}] ${option}`);
        this.name = 'PreferenceNotFoundError';
        this.section = section;
        this.option = option;
    }
}

export class InvalidPreferenceKeyError extends Error {
    constructor(kind: 'section' | 'option', value: string) {
        super(`Invalid preference ${kind} name: ${JSON.stringify(value)}`);
        this.name = 'InvalidPreferenceKeyError';
    }
}

function assertToken(kind: 'section' | 'option', value: string): void {
    if (!TOKEN.test(value) || value === RESERVED) throw new InvalidPreferenceKeyError(kind, value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Parse the file into section -> option -> string. Nested or array entries are skipped. */
function readSections(configFile: string): Sections {
    const sections: Sections = new Map();
    if (!fs.existsSync(configFile)) return sections;
    const parsed: unknown = decode(fs.readFileSync(configFile, 'utf-8'));
    if (!isRecord(parsed)) return sections;
    for (const [name, body] of Object.entries(parsed)) {
        if (!isRecord(body)) continue;
        const options = new Map<string, string>();
        for (const [key, value] of Object.entries(body)) {
            // ini turns true/false/null literals into primitives; hand them back as text
            if (typeof value === 'string') options.set(key, value);
            else if (typeof value === 'boolean' || typeof value === 'number' || value === null) options.set(key, String(value));
        }
        sections.set(name, options);
    }
    return sections;
}

function writeSections(configFile: string, sections: Sections): void {
    fs.mkdirSync(path.dirname(configFile), { recursive: true });
    const tmpFile = `${configFile}.${process.pid}.tmp`;
    const text = encode(Object.fromEntries(
        [...sections].map(([name, options]) => [name, Object.fromEntries(options)]),
    ));
    const fd = fs.openSync(tmpFile, 'w', 0o600);
    try {
        try {
            fs.writeSync(fd, text);
            fs.fsyncSync(fd);
        } finally {
            fs.closeSync(fd);
        }
        fs.renameSync(tmpFile, configFile);
    } catch (err) {
        fs.rmSync(tmpFile, { force: true });
        throw err;
    }
}

/**
 * Rewrite the configuration file with the given [section] option value added
 * or changed. Every call is a full load-modify-store cycle.
 */
export function setPreference(
    section: string,
    option: string,
    value: PreferenceValue,
    configFile: string = getPreferencesPath(),
): void {
    assertToken('section', section);
    assertToken('option', option);
    const sections = readSections(configFile);
    const options = sections.get(section) ?? new Map<string, string>();
    sections.set(section, options.set(option, String(value)));
    writeSections(configFile, sections);
    logDebug(`[PREFS] Set user preference: ${section} ${option} ${String(value)}`);
}

/** Read the value for the requested [section] option, or throw PreferenceNotFoundError. */
export function getPreference(
    section: string,
    option: string,
    configFile: string = getPreferencesPath(),
): string {
    assertToken('section', section);
    assertToken('option', option);
    const value = readSections(configFile).get(section)?.get(option);
    if (value === undefined) throw new PreferenceNotFoundError(section, option);
    return value;
}

/**
 * Read and write simple values from an ini-syntax configuration file at a
 * certain location.
 */
export class PreferenceStore {
    readonly configFile: string;

    constructor(configFile: string = getPreferencesPath()) {
        this.configFile = configFile;
    }

    get(section: string, option: string): string {
        return getPreference(section, option, this.configFile);
    }

    set(section: string, option: string, value: PreferenceValue): void {
        setPreference(section, option, value, this.configFile);
    }
}
