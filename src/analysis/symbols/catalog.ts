"use strict";

import * as path from "path";

import { CatalogSettings } from "../../config";
import { DirectoryEntry, FileSystem, nodeFileSystem } from "../../shared/async/fs";
import { Logger, logger } from "../../shared/log";
import { parseDeclarationRecords } from "../syntax/definitions/declarations";
import { findSourceDefinitions } from "../syntax/definitions/sourceDefinitions";
import { SymbolCategory } from "./category";
import { buildPrefixRules, PrefixRuleTable } from "./prefixRules";

export interface CatalogStats {
    /** Files that were read and scanned. */
    readonly files: number;
    /** Directories and files that could not be read. */
    readonly unreadable: number;
    /** Declaration records that were malformed. */
    readonly skippedRecords: number;
    /** Distinct names across all categories. */
    readonly symbols: number;
}

interface CatalogSnapshot {
    readonly names: ReadonlyMap<SymbolCategory, ReadonlyArray<string>>;
    readonly lookup: ReadonlyMap<SymbolCategory, ReadonlySet<string>>;
}

const EMPTY_SNAPSHOT: CatalogSnapshot = { lookup: new Map(), names: new Map() };

/**
 * Names defined by the declaration-record files and source files under the configured roots,
 * grouped by category.
 */
export class SymbolCatalog {
    public readonly prefixRules: PrefixRuleTable;
    private snapshot = EMPTY_SNAPSHOT;
    private pending?: Promise<CatalogStats>;

    constructor(
        public readonly settings: CatalogSettings,
        private readonly fs: FileSystem = nodeFileSystem,
        private readonly log: Logger = logger) {

        this.prefixRules = buildPrefixRules(settings.categoryPrefixes);
    }

    public get building(): boolean {
        return this.pending !== undefined;
    }

    /**
     * Rescans every root and replaces the catalog's contents. Calls made while a build is running
     * share its result. Until the build finishes, lookups see the previous contents.
     */
    public build(): Promise<CatalogStats> {
        if (!this.pending) {
            this.pending = this.scan().finally(() => { this.pending = undefined; });
        }
        return this.pending;
    }

    /** Names in a category, sorted. */
    public get(category: SymbolCategory): ReadonlyArray<string> {
        return this.snapshot.names.get(category) || [];
    }

    public has(name: string, category?: SymbolCategory): boolean {
        const categories = category === undefined ? SymbolCategory.ALL : [category];
        return categories.some((c) => {
            const set = this.snapshot.lookup.get(c);
            return set !== undefined && set.has(name);
        });
    }

    /** The category a name belongs to: from the catalog if it's there, otherwise by prefix. */
    public classify(name: string): SymbolCategory | undefined {
        for (const category of SymbolCategory.ALL) {
            if (this.has(name, category)) { return category; }
        }
        return this.prefixRules.match(name);
    }

    private async scan(): Promise<CatalogStats> {
        const { settings } = this;
        const found = new Map<SymbolCategory, Set<string>>(
            SymbolCategory.ALL.map((c): [SymbolCategory, Set<string>] => [c, new Set<string>()]));
        const add = (category: SymbolCategory, name: string) => {
            const set = found.get(category);
            if (set) { set.add(name); }
        };

        let files = 0;
        let unreadable = 0;
        let skippedRecords = 0;

        const docFiles = await this.collectFiles(settings.docRoots, settings.docExtensions);
        const sourceFiles = await this.collectFiles(settings.sourceRoots, settings.sourceExtensions);
        unreadable += docFiles.unreadable + sourceFiles.unreadable;
        this.log.verbose(
            `[catalog] scanning ${docFiles.files.length} declaration files, ${sourceFiles.files.length} source files`);

        // a file that fails to read or parse is skipped whole
        const readEach = async (list: ReadonlyArray<string>, extract: (file: string, text: string) => FoundName[]) => {
            for (const file of list) {
                let entries: FoundName[];
                try {
                    entries = extract(file, await this.fs.readFile(file));
                } catch (err) {
                    this.log.warn(`[catalog] skipping ${file}: ${describe(err)}`);
                    unreadable++;
                    continue;
                }
                entries.forEach(({ category, name }) => add(category, name));
                files++;
            }
        };

        await readEach(docFiles.files, (file, text) => {
            const { names, skipped } = parseDeclarationRecords(text, settings.docPrefixes);
            if (skipped) {
                this.log.warn(`[catalog] ${file}: skipped ${skipped} malformed record(s)`);
            }
            skippedRecords += skipped;
            return names.map((name) => ({ category: SymbolCategory.Function, name }));
        });

        await readEach(sourceFiles.files, (_file, text) => Array.from(findSourceDefinitions(text)));

        const names = new Map<SymbolCategory, ReadonlyArray<string>>();
        const lookup = new Map<SymbolCategory, ReadonlySet<string>>();
        let symbols = 0;
        for (const [category, set] of found) {
            names.set(category, Object.freeze(Array.from(set).sort()));
            lookup.set(category, set);
            symbols += set.size;
        }
        this.snapshot = { lookup, names };

        this.log.log(`[catalog] ${SymbolCategory.ALL
            .map((c) => `${SymbolCategory.getFriendlyName(c)}: ${this.get(c).length}`)
            .join(", ")} from ${files} file(s)`);

        return { files, skippedRecords, symbols, unreadable };
    }

    /** Walks the roots depth-first, returning matching files in a stable order. */
    private async collectFiles(roots: ReadonlyArray<string>, extensions: ReadonlyArray<string>) {
        const { recursive, maxDepth } = this.settings;
        const wanted = extensions.map((e) => e.toLowerCase());
        const files: string[] = [];
        const seen = new Set<string>();
        let unreadable = 0;

        for (const root of roots) {
            const stack = [{ dir: root, depth: 0 }];
            let next: { dir: string, depth: number } | undefined;
            // tslint:disable-next-line:no-conditional-assignment
            while (next = stack.pop()) {
                const { dir, depth } = next;
                let entries: DirectoryEntry[];
                try {
                    entries = await this.fs.readDirectory(dir);
                } catch (err) {
                    this.log.warn(`[catalog] skipping directory ${dir}: ${describe(err)}`);
                    unreadable++;
                    continue;
                }

                const subdirs: string[] = [];
                for (const entry of entries.slice().sort((a, b) => compareNames(a.name, b.name))) {
                    const full = path.join(dir, entry.name);
                    if (entry.isDirectory) {
                        if (recursive && depth < maxDepth) { subdirs.push(full); }
                    } else if (wanted.includes(path.extname(entry.name).toLowerCase()) && !seen.has(full)) {
                        seen.add(full);
                        files.push(full);
                    }
                }
                // pushed in reverse so they come off the stack in name order
                for (let i = subdirs.length - 1; i >= 0; i--) {
                    stack.push({ dir: subdirs[i], depth: depth + 1 });
                }
            }
        }

        return { files, unreadable };
    }
}

interface FoundName {
    category: SymbolCategory;
    name: string;
}

function compareNames(a: string, b: string) {
    return a < b ? -1 : a > b ? 1 : 0;
}

function describe(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
