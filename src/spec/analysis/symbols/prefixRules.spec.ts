"use strict";

import { SymbolCategory } from "../../../analysis/symbols/category";
import { buildPrefixRules, PrefixRuleTable } from "../../../analysis/symbols/prefixRules";

describe("buildPrefixRules", () => {
    it("orders rules longest prefix first", () => {
        const table = buildPrefixRules({ function: ["db", "x"], method: ["dbm"] });

        expect(table.rules).toEqual([
            { category: SymbolCategory.Method, prefix: "dbm" },
            { category: SymbolCategory.Function, prefix: "db" },
            { category: SymbolCategory.Function, prefix: "x" },
        ]);
    });

    it("ignores empty prefixes", () => {
        expect(buildPrefixRules({ form: [""] }).rules).toEqual([]);
    });
});

describe("PrefixRuleTable", () => {
    const table = buildPrefixRules({ class: ["ui"], form: ["dbm"], function: ["db"] });

    it("classifies by the longest matching prefix", () => {
        expect(table.match("dbmCreate")).toBe(SymbolCategory.Form);
        expect(table.match("dbOpen")).toBe(SymbolCategory.Function);
        expect(table.match("uiWindow")).toBe(SymbolCategory.Class);
    });

    it("leaves other names uncategorized", () => {
        expect(table.match("open")).toBeUndefined();
        expect(PrefixRuleTable.EMPTY.match("dbOpen")).toBeUndefined();
    });

    it("cannot be changed after it is built", () => {
        expect(Object.isFrozen(table.rules)).toBe(true);
        expect(Object.isFrozen(table.rules[0])).toBe(true);
    });
});

describe("SymbolCategory", () => {
    it("maps categories to and from settings keys", () => {
        expect(SymbolCategory.ALL.map(SymbolCategory.getKey)).toEqual(["function", "form", "class", "method"]);
        expect(SymbolCategory.fromKey("class")).toBe(SymbolCategory.Class);
        expect(SymbolCategory.fromKey("macro")).toBeUndefined();
    });

    it("calls forms macros", () => {
        expect(SymbolCategory.getFriendlyName(SymbolCategory.Form)).toBe("Macro");
        expect(SymbolCategory.getFriendlyName(SymbolCategory.Method)).toBe("Method");
    });
});
