"use strict";

import { HasRange, Range } from "../../range";
import { TextBuffer, textOf } from "../../workspace/document";
import { TokenIndex } from "../tokens/tokenIndex";
import { Token, TokenKind } from "../tokens/tokens";

export const DEFAULT_MAX_STEPS = 10000;

/** One structural unit: an atom or string, or a balanced list, with any quote prefixes before it. */
export interface Sexp extends HasRange {
    readonly range: Range;
    readonly text: string;
    readonly open?: Token<TokenKind.Open>;
    readonly close?: Token<TokenKind.Close>;
}

/**
 * Moves over the text one structural unit at a time. A navigator is a snapshot: build a new one
 * after the buffer changes.
 *
 * None of the methods throw on unbalanced text. When there is no unit to move over, or a walk over
 * siblings runs past `maxSteps`, they return undefined. Delimiters are matched without a limit.
 */
export class SexpNavigator {
    public readonly index: TokenIndex;
    private readonly text: string;

    constructor(public readonly buffer: TextBuffer, public readonly maxSteps = DEFAULT_MAX_STEPS) {
        this.text = textOf(buffer);
        this.index = TokenIndex.of(this.text);
    }

    /**
     * Finds the sexp ending at or before `offset`. The cursor moves to its start.
     * An opening delimiter, an unmatched closing delimiter or the start of the text yields nothing.
     */
    public backwardSexp(offset: number): Sexp | undefined {
        const tokens = this.index.significant;
        const last = this.index.significantIndexBefore(offset);
        if (last < 0) { return; }

        let first = last;
        let open: Token<TokenKind.Open> | undefined;
        let close: Token<TokenKind.Close> | undefined;
        const token = tokens[last];
        if (token.is(TokenKind.Open)) {
            return;
        } else if (token.is(TokenKind.Close)) {
            first = this.index.partnerOf(last);
            if (first < 0) { return; }
            open = tokens[first].enforce(TokenKind.Open);
            close = token;
        }

        while (first > 0 && tokens[first - 1].is(TokenKind.Prefix)) {
            first--;
        }
        return this.makeSexp(first, last, open, close);
    }

    /**
     * Finds the sexp starting at or after `offset`. The cursor moves to its end.
     * A closing delimiter, an unterminated list or the end of the text yields nothing.
     */
    public forwardSexp(offset: number): Sexp | undefined {
        const tokens = this.index.significant;
        const first = this.index.significantIndexAfter(offset);
        if (first < 0) { return; }

        let i = first;
        while (tokens[i].is(TokenKind.Prefix) && i + 1 < tokens.length) {
            i++;
        }

        const token = tokens[i];
        if (token.is(TokenKind.Close)) {
            // a dangling prefix is a unit by itself
            return i > first ? this.makeSexp(first, i - 1) : undefined;
        } else if (token.is(TokenKind.Open)) {
            const last = this.index.partnerOf(i);
            if (last < 0) { return; }
            return this.makeSexp(first, last, token, tokens[last].enforce(TokenKind.Close));
        }
        return this.makeSexp(first, i);
    }

    /**
     * Finds the opening delimiter of the list enclosing `offset`, `levels` lists out. This is where
     * `backwardSexp` would land if that many closing delimiters were inserted at `offset`.
     */
    public upList(offset: number, levels = 1): Token<TokenKind.Open> | undefined {
        let pos = offset;
        let open: Token<TokenKind.Open> | undefined;
        for (let level = 0; level < levels; level++) {
            open = this.enclosingOpen(pos);
            if (!open) { return; }
            pos = open.start;
        }
        return open;
    }

    /** The first significant token inside a list, or undefined if the list has no contents yet. */
    public firstChild(open: Token<TokenKind.Open>): Token | undefined {
        const i = this.index.significantIndexAfter(open.end);
        if (i < 0) { return; }
        const token = this.index.significant[i];
        return token.is(TokenKind.Close) ? undefined : token;
    }

    private enclosingOpen(offset: number): Token<TokenKind.Open> | undefined {
        let pos = offset;
        for (let steps = 0; steps < this.maxSteps; steps++) {
            const sexp = this.backwardSexp(pos);
            if (!sexp) {
                const i = this.index.significantIndexBefore(pos);
                const token = i >= 0 ? this.index.significant[i] : undefined;
                return token && token.is(TokenKind.Open) ? token : undefined;
            }
            pos = sexp.range.start;
        }
        return undefined;
    }

    private makeSexp(
        first: number, last: number,
        open?: Token<TokenKind.Open>, close?: Token<TokenKind.Close>): Sexp {

        const tokens = this.index.significant;
        const range = new Range(tokens[first].start, tokens[last].end);
        return { range, text: this.text.substring(range.start, range.end), open, close };
    }
}
