"use strict";

import { HasRange } from "../../range";
import { TextSource } from "../../workspace/document";
import tokenize from "./tokenize";
import { Token, TokenKind } from "./tokens";

export type ScanDirection = "forward" | "backward";

export interface ScanOptions {
    /** Whether whitespace and comments are returned too. */
    trivia?: boolean;
}

/**
 * A snapshot of the tokens of a text, searchable by offset. It is only valid until the text changes.
 */
export class TokenIndex {
    public static of(source: TextSource): TokenIndex {
        return new TokenIndex(Array.from(tokenize(source)));
    }

    /** The tokens that are not whitespace or comments. */
    public readonly significant: ReadonlyArray<Token>;

    /** For each index into `significant`, the index of the matching delimiter, or -1. */
    private readonly partners: ReadonlyArray<number>;

    constructor(public readonly tokens: ReadonlyArray<Token>) {
        this.significant = tokens.filter((t) => !t.isTrivia);
        this.partners = matchDelimiters(this.significant);
    }

    /** Index into `significant` of the delimiter matching the one at `index`, or -1 if it is unmatched. */
    public partnerOf(index: number): number {
        return index >= 0 && index < this.partners.length ? this.partners[index] : -1;
    }

    /**
     * Going forward: the first token that ends after `offset`, which may contain it.
     * Going backward: the last token that starts before `offset`, which may contain it.
     */
    public scan(offset: number, direction: ScanDirection, options: ScanOptions = {}): Token | undefined {
        const tokens = options.trivia ? this.tokens : this.significant;
        const i = direction === "forward"
            ? TokenIndex.indexAfter(tokens, offset)
            : TokenIndex.indexBefore(tokens, offset);
        return i >= 0 ? tokens[i] : undefined;
    }

    /** Index into `significant` of the first token ending after `offset`, or -1. */
    public significantIndexAfter(offset: number) {
        return TokenIndex.indexAfter(this.significant, offset);
    }

    /** Index into `significant` of the last token starting before `offset`, or -1. */
    public significantIndexBefore(offset: number) {
        return TokenIndex.indexBefore(this.significant, offset);
    }

    private static indexAfter(tokens: ReadonlyArray<Token>, offset: number): number {
        const i = HasRange.binarySearchIndex(tokens, offset);
        const result = i >= 0 ? i : -i - 1;
        return result < tokens.length ? result : -1;
    }

    private static indexBefore(tokens: ReadonlyArray<Token>, offset: number): number {
        const i = HasRange.binarySearchIndex(tokens, offset);
        if (i >= 0) {
            return tokens[i].start < offset ? i : i - 1;
        }
        return -i - 2;
    }
}

function matchDelimiters(tokens: ReadonlyArray<Token>): number[] {
    const partners = new Array<number>(tokens.length).fill(-1);
    const opens: number[] = [];
    tokens.forEach((token, i) => {
        if (token.is(TokenKind.Open)) {
            opens.push(i);
        } else if (token.is(TokenKind.Close)) {
            const open = opens.pop();
            if (open !== undefined) {
                partners[open] = i;
                partners[i] = open;
            }
        }
    });
    return partners;
}

/** Returns the token next to `fromOffset`, or undefined at the end of the input. */
export function scan(source: TextSource, fromOffset: number, direction: ScanDirection): Token | undefined {
    return TokenIndex.of(source).scan(fromOffset, direction, { trivia: true });
}
