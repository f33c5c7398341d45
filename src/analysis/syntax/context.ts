"use strict";

import { TextBuffer } from "../workspace/document";
import { SexpNavigator } from "./sexpr/navigator";
import { Token, TokenKind } from "./tokens/tokens";

/** Where a cursor sits relative to one of the lists enclosing it. */
export interface SexpContext {
    /** The list's first element, when that is an atom. */
    readonly head?: string;
    /** Column of the opening delimiter. */
    readonly column: number;
    /** Number of complete elements (the head included) that end before the cursor. */
    readonly argIndex: number;
    /** Line of the opening delimiter. */
    readonly line: number;
    /** Offset of the opening delimiter. */
    readonly start: number;
}

export interface ContextPair {
    readonly current?: SexpContext;
    readonly parent?: SexpContext;
}

/** Column at which the head of a list starts. */
export function headColumn(context: SexpContext): number {
    return context.column + 1;
}

/**
 * Resolves the innermost list enclosing `offset` (current) and the list around that (parent).
 * Either is undefined when the cursor is that close to the top level.
 */
export function resolveContexts(source: TextBuffer | SexpNavigator, offset: number): ContextPair {
    const navigator = source instanceof SexpNavigator ? source : new SexpNavigator(source);
    const currentOpen = navigator.upList(offset);
    if (!currentOpen) { return {}; }
    const current = buildContext(navigator, currentOpen, offset);

    const parentOpen = navigator.upList(currentOpen.start);
    if (!parentOpen) { return { current }; }
    return { current, parent: buildContext(navigator, parentOpen, offset) };
}

export function resolveCurrentContext(source: TextBuffer | SexpNavigator, offset: number): SexpContext | undefined {
    return resolveContexts(source, offset).current;
}

export function resolveParentContext(source: TextBuffer | SexpNavigator, offset: number): SexpContext | undefined {
    return resolveContexts(source, offset).parent;
}

function buildContext(navigator: SexpNavigator, open: Token<TokenKind.Open>, offset: number): SexpContext {
    const first = navigator.firstChild(open);
    const head = first && first.is(TokenKind.Atom) ? first.text : undefined;

    let argIndex = 0;
    let pos = open.end;
    for (let steps = 0; steps < navigator.maxSteps; steps++) {
        const sibling = navigator.forwardSexp(pos);
        if (!sibling || sibling.range.end >= offset) { break; }
        argIndex++;
        pos = sibling.range.end;
    }

    const { buffer } = navigator;
    return {
        argIndex,
        column: buffer.columnAt(open.start),
        head,
        line: buffer.lineAt(open.start),
        start: open.start,
    };
}
