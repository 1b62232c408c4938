import * as path from "path";
import * as fs from "fs";
import * as yaml from "js-yaml";

export interface Config {
    projectRoot: string;
    /** Path of the optional settings file */
    settingsPath: string;
    /** Seconds between automatic backups; 0 disables autosave */
    autosaveIntervalSecs: number;
    /** Seconds to wait before retrying an autosave deferred by an active command */
    autosaveRetrySecs: number;
    /** Hit-testing radius of the default element locator, in board units */
    hitTolerance: number;
}

/** Shape of netedit.yml; every key is optional. */
export interface SettingsFile {
    autosave?: {
        interval?: number;
        retry?: number;
    };
    hitTolerance?: number;
}

export const DEFAULT_SETTINGS = {
    autosaveIntervalSecs: 600,
    autosaveRetrySecs: 10,
    hitTolerance: 0.001,
} as const;

let configCache: Config | null = null;

export function getConfig(): Config {
    if (configCache) return configCache;

    const cwd = process.env.INIT_CWD || process.cwd();

    // 1. Env var, 2. cwd
    const projectRoot = process.env.NETEDIT_ROOT ? path.resolve(cwd, process.env.NETEDIT_ROOT) : cwd;
    const settingsPath = path.join(projectRoot, "netedit.yml");
    const settings = loadSettings(settingsPath);

    configCache = {
        projectRoot,
        settingsPath,
        autosaveIntervalSecs: envNumber("NETEDIT_AUTOSAVE_INTERVAL")
            ?? settings.autosave?.interval
            ?? DEFAULT_SETTINGS.autosaveIntervalSecs,
        autosaveRetrySecs: settings.autosave?.retry ?? DEFAULT_SETTINGS.autosaveRetrySecs,
        hitTolerance: envNumber("NETEDIT_HIT_TOLERANCE")
            ?? settings.hitTolerance
            ?? DEFAULT_SETTINGS.hitTolerance,
    };

    return configCache;
}

/** Forget the cached config, e.g. after changing the environment in tests. */
export function resetConfig(): void {
    configCache = null;
}

/**
 * Loads netedit.yml. A missing file yields no settings; an unreadable or
 * malformed one is reported and ignored.
 */
export function loadSettings(settingsPath: string): SettingsFile {
    if (!fs.existsSync(settingsPath)) {
        return {};
    }
    try {
        const content = fs.readFileSync(settingsPath, "utf-8");
        return parseSettings(yaml.load(content));
    } catch (e) {
        console.warn(`⚠️  Failed to parse ${path.basename(settingsPath)}: ${e}`);
        return {};
    }
}

/** Pick the known keys out of a parsed YAML document, dropping anything of the wrong type. */
export function parseSettings(doc: unknown): SettingsFile {
    if (!isRecord(doc)) return {};

    const result: SettingsFile = {};
    const autosave = doc.autosave;
    if (isRecord(autosave)) {
        result.autosave = {};
        const interval = nonNegative(autosave.interval);
        const retry = nonNegative(autosave.retry);
        if (interval !== undefined) result.autosave.interval = interval;
        if (retry !== undefined) result.autosave.retry = retry;
    }
    const tolerance = nonNegative(doc.hitTolerance);
    if (tolerance !== undefined) result.hitTolerance = tolerance;
    return result;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function nonNegative(value: unknown): number | undefined {
    return typeof value === "number" && Number.isFinite(value) && value >= 0 ? value : undefined;
}

function envNumber(name: string): number | undefined {
    const raw = process.env[name];
    if (raw === undefined || raw.trim() === "") return undefined;
    return nonNegative(Number(raw));
}
