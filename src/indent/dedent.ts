"use strict";

import { SexpNavigator } from "../analysis/syntax/sexpr/navigator";
import { getLineText } from "../analysis/workspace/document";

/** A column to indent a line to. */
export interface IndentEdit {
    readonly line: number;
    readonly column: number;
}

const CLOSER_LINE_REGEX = /^\s*\)+\s*(?:;.*)?$/;
const BARE_CLOSER_LINE_REGEX = /^\s*\)+\s*$/;

/** A line holding only closing delimiters, possibly followed by a comment. */
export function isCloserLine(lineText: string): boolean {
    return CLOSER_LINE_REGEX.test(lineText);
}

/** A line holding only closing delimiters. */
export function isBareCloserLine(lineText: string): boolean {
    return BARE_CLOSER_LINE_REGEX.test(lineText);
}

/**
 * The column of the opening delimiter matched by the last closing delimiter on a closer line,
 * or undefined if it has no match.
 */
export function closerColumn(navigator: SexpNavigator, line: number): number | undefined {
    const { buffer } = navigator;
    const text = getLineText(buffer, line);
    const match = /^\s*\)+/.exec(text);
    if (!match) { return; }

    const lastClose = buffer.lineStart(line) + match[0].length - 1;
    const sexp = navigator.backwardSexp(lastClose + 1);
    return sexp && sexp.open ? buffer.columnAt(sexp.open.start) : undefined;
}

/**
 * Aligns a closer line with its opener, then walks upward re-aligning the bare closer lines
 * directly above it, at most `maxSteps` of them. Returns no edits if `line` is not a closer line
 * or its last delimiter is unmatched.
 */
export function dedentPass(navigator: SexpNavigator, line: number, maxSteps: number): IndentEdit[] {
    const { buffer } = navigator;
    if (!isCloserLine(getLineText(buffer, line))) { return []; }

    const column = closerColumn(navigator, line);
    if (column === undefined) { return []; }
    const edits: IndentEdit[] = [{ column, line }];

    for (let above = line - 1, steps = 0; above >= 0 && steps < maxSteps; above--, steps++) {
        if (!isBareCloserLine(getLineText(buffer, above))) { break; }
        const aboveColumn = closerColumn(navigator, above);
        if (aboveColumn === undefined) { break; }
        edits.push({ column: aboveColumn, line: above });
    }

    return edits;
}
