"use strict";

import { CategoryPrefixes } from "../../config";
import { SymbolCategory } from "./category";

export interface PrefixRule {
    readonly prefix: string;
    readonly category: SymbolCategory;
}

/** Classifies names by prefix. Longer prefixes are tried first. */
export class PrefixRuleTable {
    public static readonly EMPTY = new PrefixRuleTable([]);

    public readonly rules: ReadonlyArray<PrefixRule>;

    constructor(rules: ReadonlyArray<PrefixRule>) {
        // prefixes of equal length keep their given order
        this.rules = Object.freeze(rules
            .map((rule, i) => ({ rule, i }))
            .sort((a, b) => b.rule.prefix.length - a.rule.prefix.length || a.i - b.i)
            .map(({ rule }) => Object.freeze({ ...rule })));
    }

    public match(name: string): SymbolCategory | undefined {
        const rule = this.rules.find((r) => name.startsWith(r.prefix));
        return rule && rule.category;
    }
}

export function buildPrefixRules(prefixes: CategoryPrefixes): PrefixRuleTable {
    const rules: PrefixRule[] = [];
    for (const category of SymbolCategory.ALL) {
        for (const prefix of prefixes[SymbolCategory.getKey(category)] || []) {
            if (prefix) {
                rules.push({ category, prefix });
            }
        }
    }
    return new PrefixRuleTable(rules);
}
