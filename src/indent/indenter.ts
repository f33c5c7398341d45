"use strict";

import { resolveContexts } from "../analysis/syntax/context";
import { SexpNavigator } from "../analysis/syntax/sexpr/navigator";
import { TokenIndex } from "../analysis/syntax/tokens/tokenIndex";
import { TokenKind } from "../analysis/syntax/tokens/tokens";
import {
    EditableBuffer, getLineIndentation, setLineIndentation, TextBuffer,
} from "../analysis/workspace/document";
import { dedentPass, IndentEdit } from "./dedent";
import { decideIndent, IndentLine, IndentRuleTable } from "./rules";

/**
 * Computes the indentation of the line containing `offset`. The first edit is for that line; any
 * others re-align closer lines above it. A line that starts inside a string or block comment gets
 * no edits, since its leading blanks are part of that text.
 */
export function computeIndent(buffer: TextBuffer, offset: number, table: IndentRuleTable): IndentEdit[] {
    const navigator = new SexpNavigator(buffer, table.maxSteps);
    const line = buffer.lineAt(offset);
    const { start, width } = getLineIndentation(buffer, line);
    const position = start + width;
    if (startsInsideText(navigator.index, position, buffer.length())) { return []; }

    const dedents = dedentPass(navigator, line, table.maxDedentSteps);
    if (dedents.length) { return dedents; }

    const { current, parent } = resolveContexts(navigator, position);

    const token = navigator.index.scan(position, "forward");
    const target: IndentLine = {
        firstToken: token && token.start === position ? token : undefined,
        line,
    };
    return [{ column: decideIndent(current, parent, target, table), line }];
}

/**
 * Applies edits from the bottom of the buffer up.
 * @returns The number of lines whose text changed.
 */
export function applyIndentEdits(buffer: EditableBuffer, edits: ReadonlyArray<IndentEdit>): number {
    let changed = 0;
    for (const edit of edits.slice().sort((a, b) => b.line - a.line)) {
        if (setLineIndentation(buffer, edit.line, edit.column)) {
            changed++;
        }
    }
    return changed;
}

/** Indents the line containing `offset` and returns its new column. */
export function indentLine(buffer: EditableBuffer, offset: number, table: IndentRuleTable): number {
    const edits = computeIndent(buffer, offset, table);
    if (!edits.length) {
        return getLineIndentation(buffer, buffer.lineAt(offset)).width;
    }
    applyIndentEdits(buffer, edits);
    return edits[0].column;
}

/**
 * Indents lines `startLine` through `endLine` in order. Blank lines, and lines inside strings or
 * block comments, are left alone.
 * @returns The number of lines whose text changed.
 */
export function indentRegion(buffer: EditableBuffer, startLine: number, endLine: number, table: IndentRuleTable) {
    const last = Math.min(endLine, buffer.lineCount() - 1);
    let changed = 0;
    for (let line = Math.max(0, startLine); line <= last; line++) {
        if (getLineIndentation(buffer, line).blank) { continue; }
        changed += applyIndentEdits(buffer, computeIndent(buffer, buffer.lineStart(line), table));
    }
    return changed;
}

/**
 * Breaks the line at `offset`, dropping blanks before the break, and indents the new line.
 * @returns The offset just after the new line's indentation.
 */
export function newlineAndIndent(buffer: EditableBuffer, offset: number, table: IndentRuleTable): number {
    const lineStart = buffer.lineStart(buffer.lineAt(offset));
    let breakAt = offset;
    while (breakAt > lineStart && /[ \t]/.test(buffer.readRange(breakAt - 1, breakAt))) {
        breakAt--;
    }

    buffer.replaceRange(breakAt, offset, "\n");
    const newLine = buffer.lineAt(breakAt) + 1;
    const column = indentLine(buffer, buffer.lineStart(newLine), table);
    return buffer.lineStart(newLine) + column;
}

/** Whether `position` is inside a string or comment, including one that runs to the end of the text. */
function startsInsideText(index: TokenIndex, position: number, length: number): boolean {
    const token = index.scan(position, "backward", { trivia: true });
    if (token && (token.is(TokenKind.String) || token.is(TokenKind.Comment)) && token.end > position) {
        return true;
    }
    // the tokenizer stops at an unterminated string or block comment
    const tokens = index.tokens;
    const end = tokens.length ? tokens[tokens.length - 1].end : 0;
    return end < length && position > end;
}
