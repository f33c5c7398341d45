"use strict";

import isEqual = require("lodash.isequal");

import { CatalogStats, SymbolCatalog } from "./analysis/symbols/catalog";
import { SymbolCategory } from "./analysis/symbols/category";
import { ContextPair, resolveContexts } from "./analysis/syntax/context";
import { SexpNavigator } from "./analysis/syntax/sexpr/navigator";
import { EditableBuffer, TextBuffer } from "./analysis/workspace/document";
import { DEFAULT_SETTINGS, loadSettings, Settings } from "./config";
import { indentLine, indentRegion, newlineAndIndent } from "./indent/indenter";
import { buildIndentRules, IndentRuleTable } from "./indent/rules";
import { FileSystem, nodeFileSystem } from "./shared/async/fs";
import { Logger, logger } from "./shared/log";

/** Editing operations over any buffer, configured by one set of settings. */
export class EditingSession {
    private currentSettings: Settings;
    private rules: IndentRuleTable;
    private symbols: SymbolCatalog;

    constructor(
        settings: Settings = DEFAULT_SETTINGS,
        private readonly fs: FileSystem = nodeFileSystem,
        private readonly log: Logger = logger) {

        this.currentSettings = settings;
        this.rules = buildIndentRules(settings.indent);
        this.symbols = new SymbolCatalog(settings.catalog, fs, log);
    }

    public get settings(): Settings { return this.currentSettings; }
    public get indentRules(): IndentRuleTable { return this.rules; }
    public get catalog(): SymbolCatalog { return this.symbols; }

    /**
     * Switches to new settings, rebuilding only the parts whose settings changed. A new catalog
     * starts out empty; call `rebuildCatalog` to fill it.
     * @returns Whether anything changed.
     */
    public reconfigure(settings: Settings): boolean {
        const old = this.currentSettings;
        if (isEqual(old, settings)) { return false; }

        this.currentSettings = settings;
        if (!isEqual(old.log, settings.log)) {
            this.log.setup(settings.log.level);
        }
        if (!isEqual(old.indent, settings.indent)) {
            this.rules = buildIndentRules(settings.indent);
        }
        if (!isEqual(old.catalog, settings.catalog)) {
            this.symbols = new SymbolCatalog(settings.catalog, this.fs, this.log);
            this.log.verbose("[session] catalog settings changed");
        }
        return true;
    }

    public rebuildCatalog(): Promise<CatalogStats> {
        return this.symbols.build();
    }

    public resolveContexts(buffer: TextBuffer, offset: number): ContextPair {
        return resolveContexts(new SexpNavigator(buffer, this.rules.maxSteps), offset);
    }

    public indentLine(buffer: EditableBuffer, offset: number): number {
        return indentLine(buffer, offset, this.rules);
    }

    public indentRegion(buffer: EditableBuffer, startLine: number, endLine: number): number {
        return indentRegion(buffer, startLine, endLine, this.rules);
    }

    public newlineAndIndent(buffer: EditableBuffer, offset: number): number {
        return newlineAndIndent(buffer, offset, this.rules);
    }

    public classify(name: string): SymbolCategory | undefined {
        return this.symbols.classify(name);
    }
}

/**
 * Starts a session: loads the settings file, if there is one, and builds the symbol catalog.
 * @throws {SettingsError} if the settings file can't be read or parsed.
 */
export async function activate(
    settingsFile?: string, fs: FileSystem = nodeFileSystem, log: Logger = logger): Promise<EditingSession> {

    const settings = settingsFile ? await loadSettings(settingsFile, fs, log) : DEFAULT_SETTINGS;
    log.setup(settings.log.level);

    const session = new EditingSession(settings, fs, log);
    const stats = await session.rebuildCatalog();
    log.verbose(`[session] started with ${stats.symbols} symbols`);
    return session;
}
