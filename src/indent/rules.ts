"use strict";

import { IndentSettings } from "../config";
import { headColumn, SexpContext } from "../analysis/syntax/context";
import { Token, TokenKind } from "../analysis/syntax/tokens/tokens";

/** Indentation settings in lookup form. Build one with `buildIndentRules`. */
export interface IndentRuleTable {
    readonly alignForms: ReadonlyMap<string, number>;
    readonly bindingForms: ReadonlySet<string>;
    readonly blockForms: ReadonlySet<string>;
    readonly definitionForms: ReadonlySet<string>;
    readonly classForms: ReadonlySet<string>;
    readonly wrappingForms: ReadonlySet<string>;
    readonly keywordParamPrefix: string;
    readonly keywordParamOffset: number;
    readonly maxSteps: number;
    readonly maxDedentSteps: number;
}

export function buildIndentRules(settings: IndentSettings): IndentRuleTable {
    return Object.freeze({
        alignForms: new Map(Object.entries(settings.alignForms)),
        bindingForms: new Set(settings.bindingForms),
        blockForms: new Set(settings.blockForms),
        classForms: new Set(settings.classForms),
        definitionForms: new Set(settings.definitionForms),
        keywordParamOffset: settings.keywordParamOffset,
        keywordParamPrefix: settings.keywordParamPrefix,
        maxDedentSteps: settings.maxDedentSteps,
        maxSteps: settings.maxSteps,
        wrappingForms: new Set(settings.wrappingForms),
    });
}

/** The line being indented. */
export interface IndentLine {
    readonly line: number;
    /** First significant token on the line, if the line has one. */
    readonly firstToken?: Token;
}

interface RuleInput {
    readonly current?: SexpContext;
    readonly parent?: SexpContext;
    readonly line: IndentLine;
    readonly table: IndentRuleTable;
}

export interface IndentRule {
    readonly name: string;
    /** Returns the column, or undefined if the rule doesn't apply. */
    apply(input: RuleInput): number | undefined;
}

type HeadedContext = SexpContext & { readonly head: string };

function isIn(context: SexpContext | undefined, forms: ReadonlySet<string>): context is HeadedContext {
    return !!context && context.head !== undefined && forms.has(context.head);
}

/** Ordered; the first rule that applies wins. */
export const INDENT_RULES: ReadonlyArray<IndentRule> = [
    {
        name: "align",
        apply({ current, table }) {
            if (!current || current.head === undefined) { return; }
            const offset = table.alignForms.get(current.head);
            return offset === undefined ? undefined : headColumn(current) + offset;
        },
    },
    {
        name: "binding list",
        apply({ parent, table }) {
            if (!isIn(parent, table.bindingForms) || parent.argIndex !== 1) { return; }
            return headColumn(parent) + parent.head.length + 2;
        },
    },
    {
        name: "block",
        apply({ current, table }) {
            if (!isIn(current, table.blockForms)) { return; }
            return headColumn(current) + current.head.length + 2;
        },
    },
    {
        name: "parameter list",
        apply({ parent, line, table }) {
            if (!isIn(parent, table.definitionForms) || parent.argIndex !== 2) { return; }
            const token = line.firstToken;
            const keyword = !!token && token.is(TokenKind.Atom) && token.text.startsWith(table.keywordParamPrefix);
            return parent.column + (keyword ? table.keywordParamOffset : 1);
        },
    },
    {
        name: "docstring",
        apply({ current, line, table }) {
            if (!isIn(current, table.definitionForms) || current.argIndex !== 3) { return; }
            return line.firstToken && line.firstToken.is(TokenKind.String) ? 0 : undefined;
        },
    },
    {
        name: "class slots",
        apply({ parent, table }) {
            if (!isIn(parent, table.classForms) || parent.argIndex !== 3) { return; }
            return parent.column + 1;
        },
    },
    {
        name: "wrapping",
        apply({ current, table }) {
            if (!isIn(current, table.wrappingForms) || current.argIndex >= 3) { return; }
            return headColumn(current) + current.head.length + 2;
        },
    },
    {
        name: "same line",
        apply({ current, parent, line }) {
            if (!current || current.line !== line.line) { return; }
            return !parent || parent.line === line.line ? 0 : undefined;
        },
    },
    {
        name: "default",
        apply({ current }) {
            return current ? current.column + 2 : 0;
        },
    },
];

export interface IndentDecision {
    readonly rule: string;
    readonly column: number;
}

export function selectIndentRule(
    current: SexpContext | undefined, parent: SexpContext | undefined,
    line: IndentLine, table: IndentRuleTable): IndentDecision {

    const input = { current, line, parent, table };
    for (const rule of INDENT_RULES) {
        const column = rule.apply(input);
        if (column !== undefined) {
            return { column: Math.max(0, column), rule: rule.name };
        }
    }
    return { column: 0, rule: "none" };
}

/** The column a line should be indented to, given the lists enclosing its first character. */
export function decideIndent(
    current: SexpContext | undefined, parent: SexpContext | undefined,
    line: IndentLine, table: IndentRuleTable): number {

    return selectIndentRule(current, parent, line, table).column;
}
