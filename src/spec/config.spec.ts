"use strict";

import { DEFAULT_SETTINGS, loadSettings, parseSettings, SettingsError } from "../config";
import { Logger, LogLevel, nullLogger } from "../shared/log";
import { MemoryFileSystem } from "./helpers/memoryFileSystem";

function spyLogger() {
    return jasmine.createSpyObj<Logger>("logger", ["setup", "verbose", "log", "warn", "error"]);
}

describe("parseSettings", () => {
    it("uses defaults for an empty object", () => {
        expect(parseSettings("{}", nullLogger)).toEqual(DEFAULT_SETTINGS);
    });

    it("aligns comparison forms one column past the head", () => {
        expect(DEFAULT_SETTINGS.indent.alignForms["and"]).toBe(4);
        expect(DEFAULT_SETTINGS.indent.alignForms["=="]).toBe(3);
    });

    it("merges given fields over the defaults", () => {
        const settings = parseSettings(`{
            // local overrides
            "indent": { "maxSteps": 50, "blockForms": ["begin"], },
            "catalog": { "categoryPrefixes": { "form": ["dbm"] } },
            "log": { "level": "WARN" },
        }`, nullLogger);

        expect(settings.indent.maxSteps).toBe(50);
        expect(settings.indent.blockForms).toEqual(["begin"]);
        expect(settings.indent.wrappingForms).toEqual(DEFAULT_SETTINGS.indent.wrappingForms);
        expect(settings.catalog.categoryPrefixes).toEqual({ form: ["dbm"] });
        expect(settings.log.level).toBe(LogLevel.Warn);
    });

    it("reports fields of the wrong type and keeps their defaults", () => {
        const log = spyLogger();
        const settings = parseSettings(`{ "indent": { "maxSteps": -1 }, "log": { "level": "loud" } }`, log, "a.json");

        expect(settings.indent.maxSteps).toBe(DEFAULT_SETTINGS.indent.maxSteps);
        expect(settings.log.level).toBe(LogLevel.Log);
        expect(log.warn).toHaveBeenCalledWith(
            "[settings] ignoring indent.maxSteps in a.json: expected a non-negative integer");
        expect(log.warn).toHaveBeenCalledWith(
            "[settings] ignoring log.level in a.json: expected one of verbose, log, warn, error, stop");
    });

    it("reports sections that are not objects", () => {
        const log = spyLogger();
        const settings = parseSettings(`{ "catalog": 3 }`, log);

        expect(settings.catalog).toEqual(DEFAULT_SETTINGS.catalog);
        expect(log.warn).toHaveBeenCalledWith("[settings] ignoring catalog: expected an object");
    });

    it("rejects unknown symbol categories", () => {
        const log = spyLogger();
        const settings = parseSettings(`{ "catalog": { "categoryPrefixes": { "macro": ["m"] } } }`, log);

        expect(settings.catalog.categoryPrefixes).toEqual({});
        expect(log.warn).toHaveBeenCalledTimes(1);
    });

    it("rejects text that is not JSON", () => {
        expect(() => parseSettings("{", nullLogger, "a.json"))
            .toThrow(new SettingsError("invalid settings: CloseBraceExpected at offset 1", "a.json"));
    });

    it("rejects settings that are not an object", () => {
        expect(() => parseSettings("[]", nullLogger)).toThrowError(SettingsError, "settings must be an object");
    });
});

describe("loadSettings", () => {
    it("reads settings from a file", async () => {
        const log = spyLogger();
        const fs = new MemoryFileSystem({ "/cfg/settings.json": `{ "catalog": { "recursive": false } }` });
        const settings = await loadSettings("/cfg/settings.json", fs, log);

        expect(settings.catalog.recursive).toBe(false);
        expect(log.verbose).toHaveBeenCalledWith("[settings] loaded /cfg/settings.json");
    });

    it("fails when the file cannot be read", async () => {
        await expectAsync(loadSettings("/cfg/none.json", new MemoryFileSystem({}), nullLogger))
            .toBeRejectedWithError(SettingsError,
                "/cfg/none.json: unable to read settings: ENOENT: no such file or directory, open '/cfg/none.json'");
    });
});
