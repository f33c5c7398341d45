"use strict";

import * as JSONC from "jsonc-parser";

import { SymbolCategory, SymbolCategoryKey } from "./analysis/symbols/category";
import { FileSystem, nodeFileSystem } from "./shared/async/fs";
import { Logger, logger, LogLevel, parseLogLevel } from "./shared/log";

export type CategoryPrefixes = { readonly [K in SymbolCategoryKey]?: ReadonlyArray<string> };

export interface CatalogSettings {
    /** Directories holding declaration-record (documentation index) files. */
    readonly docRoots: ReadonlyArray<string>;
    /** Directories holding source files. */
    readonly sourceRoots: ReadonlyArray<string>;
    readonly recursive: boolean;
    /** How many directory levels below a root are searched when `recursive` is set. */
    readonly maxDepth: number;
    readonly docExtensions: ReadonlyArray<string>;
    readonly sourceExtensions: ReadonlyArray<string>;
    /** When not empty, declaration records are kept only if their name starts with one of these. */
    readonly docPrefixes: ReadonlyArray<string>;
    /** Names outside the catalog are classified by these prefixes. */
    readonly categoryPrefixes: CategoryPrefixes;
}

export interface IndentSettings {
    /** Forms whose arguments line up under the first one, and the offset of that column from the head. */
    readonly alignForms: { readonly [form: string]: number };
    readonly bindingForms: ReadonlyArray<string>;
    readonly blockForms: ReadonlyArray<string>;
    readonly definitionForms: ReadonlyArray<string>;
    readonly classForms: ReadonlyArray<string>;
    readonly wrappingForms: ReadonlyArray<string>;
    readonly keywordParamPrefix: string;
    readonly keywordParamOffset: number;
    readonly maxSteps: number;
    readonly maxDedentSteps: number;
}

export interface LogSettings {
    readonly level: LogLevel;
}

export interface Settings {
    readonly catalog: CatalogSettings;
    readonly indent: IndentSettings;
    readonly log: LogSettings;
}

const ALIGN_FORMS = ["and", "or", "not", "equal", "nequal", "eq", "neq", "eqv", "==", "!=", "<", "<=", ">", ">="];

export const DEFAULT_SETTINGS: Settings = {
    catalog: {
        categoryPrefixes: {},
        docExtensions: [".fnd"],
        docPrefixes: [],
        docRoots: [],
        maxDepth: 8,
        recursive: true,
        sourceExtensions: [".il", ".ils"],
        sourceRoots: [],
    },
    indent: {
        alignForms: ALIGN_FORMS.reduce<{ [form: string]: number }>((table, form) => {
            table[form] = form.length + 1;
            return table;
        }, {}),
        bindingForms: ["let", "letseq", "letrec", "prog", "flet", "labels"],
        blockForms: ["progn", "prog1", "prog2"],
        classForms: ["defclass"],
        definitionForms: ["defun", "defmacro", "defmethod", "procedure", "mprocedure", "nprocedure", "globalProc"],
        keywordParamOffset: 6,
        keywordParamPrefix: "@",
        maxDedentSteps: 200,
        maxSteps: 10000,
        wrappingForms: ["if", "when", "unless", "while", "foreach", "for", "case", "caseq", "errset", "unwindProtect"],
    },
    log: {
        level: LogLevel.Log,
    },
};

export class SettingsError extends Error {
    constructor(message: string, public readonly file?: string) {
        super(file ? `${file}: ${message}` : message);
        this.name = "SettingsError";
    }
}

/**
 * Parses a settings file (JSON with comments). Missing fields take their defaults; fields of the
 * wrong type are reported to `log` and take their defaults too.
 * @throws {SettingsError} if the text is not valid JSONC or is not an object.
 */
export function parseSettings(text: string, log: Logger = logger, file?: string): Settings {
    const errors: JSONC.ParseError[] = [];
    const parsed: unknown = JSONC.parse(text, errors, { allowTrailingComma: true });
    if (errors.length) {
        const details = errors.map((e) => `${JSONC.printParseErrorCode(e.error)} at offset ${e.offset}`);
        throw new SettingsError(`invalid settings: ${details.join(", ")}`, file);
    }
    if (!isRecord(parsed)) {
        throw new SettingsError("settings must be an object", file);
    }

    const where = file ? ` in ${file}` : "";
    const fields = new FieldReader(log, where);
    const catalog = fields.section(parsed, "catalog");
    const indent = fields.section(parsed, "indent");
    const logSection = fields.section(parsed, "log");
    const defaults = DEFAULT_SETTINGS;
    const levelName = fields.read(logSection, "log.level", isLogLevelName,
        "one of verbose, log, warn, error, stop", "");
    const level = parseLogLevel(levelName);

    return {
        catalog: {
            categoryPrefixes: fields.read(catalog, "catalog.categoryPrefixes", isCategoryPrefixes,
                "an object mapping function/form/class/method to lists of strings",
                defaults.catalog.categoryPrefixes),
            docExtensions: fields.read(catalog, "catalog.docExtensions", isStringArray, "a list of strings",
                defaults.catalog.docExtensions),
            docPrefixes: fields.read(catalog, "catalog.docPrefixes", isStringArray, "a list of strings",
                defaults.catalog.docPrefixes),
            docRoots: fields.read(catalog, "catalog.docRoots", isStringArray, "a list of strings",
                defaults.catalog.docRoots),
            maxDepth: fields.read(catalog, "catalog.maxDepth", isCount, "a non-negative integer",
                defaults.catalog.maxDepth),
            recursive: fields.read(catalog, "catalog.recursive", isBoolean, "true or false",
                defaults.catalog.recursive),
            sourceExtensions: fields.read(catalog, "catalog.sourceExtensions", isStringArray, "a list of strings",
                defaults.catalog.sourceExtensions),
            sourceRoots: fields.read(catalog, "catalog.sourceRoots", isStringArray, "a list of strings",
                defaults.catalog.sourceRoots),
        },
        indent: {
            alignForms: fields.read(indent, "indent.alignForms", isCountTable,
                "an object mapping form names to non-negative integers", defaults.indent.alignForms),
            bindingForms: fields.read(indent, "indent.bindingForms", isStringArray, "a list of strings",
                defaults.indent.bindingForms),
            blockForms: fields.read(indent, "indent.blockForms", isStringArray, "a list of strings",
                defaults.indent.blockForms),
            classForms: fields.read(indent, "indent.classForms", isStringArray, "a list of strings",
                defaults.indent.classForms),
            definitionForms: fields.read(indent, "indent.definitionForms", isStringArray, "a list of strings",
                defaults.indent.definitionForms),
            keywordParamOffset: fields.read(indent, "indent.keywordParamOffset", isCount, "a non-negative integer",
                defaults.indent.keywordParamOffset),
            keywordParamPrefix: fields.read(indent, "indent.keywordParamPrefix", isNonEmptyString,
                "a non-empty string", defaults.indent.keywordParamPrefix),
            maxDedentSteps: fields.read(indent, "indent.maxDedentSteps", isCount, "a non-negative integer",
                defaults.indent.maxDedentSteps),
            maxSteps: fields.read(indent, "indent.maxSteps", isCount, "a non-negative integer",
                defaults.indent.maxSteps),
            wrappingForms: fields.read(indent, "indent.wrappingForms", isStringArray, "a list of strings",
                defaults.indent.wrappingForms),
        },
        log: {
            level: level === undefined ? defaults.log.level : level,
        },
    };
}

/**
 * Reads and parses a settings file.
 * @throws {SettingsError} if the file cannot be read or parsed.
 */
export async function loadSettings(
    file: string, fs: FileSystem = nodeFileSystem, log: Logger = logger): Promise<Settings> {

    let text: string;
    try {
        text = await fs.readFile(file);
    } catch (err) {
        throw new SettingsError(`unable to read settings: ${err instanceof Error ? err.message : err}`, file);
    }
    const settings = parseSettings(text, log, file);
    log.verbose(`[settings] loaded ${file}`);
    return settings;
}

// -------------------------------------------------------------------

type Fields = Readonly<Record<string, unknown>>;

class FieldReader {
    constructor(private readonly log: Logger, private readonly where: string) { }

    public section(source: Fields, key: string): Fields {
        const value = source[key];
        if (value === undefined) { return {}; }
        if (isRecord(value)) { return value; }
        this.log.warn(`[settings] ignoring ${key}${this.where}: expected an object`);
        return {};
    }

    public read<T>(source: Fields, path: string, guard: (v: unknown) => v is T, expected: string, fallback: T): T {
        const key = path.substring(path.lastIndexOf(".") + 1);
        const value = source[key];
        if (value === undefined) { return fallback; }
        if (guard(value)) { return value; }
        this.log.warn(`[settings] ignoring ${path}${this.where}: expected ${expected}`);
        return fallback;
    }
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isBoolean(value: unknown): value is boolean {
    return typeof value === "boolean";
}

function isCount(value: unknown): value is number {
    return typeof value === "number" && Number.isInteger(value) && value >= 0;
}

function isNonEmptyString(value: unknown): value is string {
    return typeof value === "string" && value.length > 0;
}

function isStringArray(value: unknown): value is string[] {
    return Array.isArray(value) && value.every((v) => typeof v === "string");
}

function isCountTable(value: unknown): value is { [form: string]: number } {
    return isRecord(value) && Object.keys(value).every((k) => isCount(value[k]));
}

function isCategoryPrefixes(value: unknown): value is CategoryPrefixes {
    return isRecord(value) &&
        Object.keys(value).every((k) => SymbolCategory.fromKey(k) !== undefined && isStringArray(value[k]));
}

function isLogLevelName(value: unknown): value is string {
    return typeof value === "string" && parseLogLevel(value) !== undefined;
}
