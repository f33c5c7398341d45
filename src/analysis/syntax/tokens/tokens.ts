"use strict";

import { HasRange, Range } from "../../range";

export class Token<TKind extends TokenKind = TokenKind> implements HasRange {
    constructor(public readonly kind: TKind, public readonly text: string, public readonly range: Range) {}

    public get start() {
        return this.range.start;
    }

    public get end() {
        return this.range.end;
    }

    /** Whitespace and comments carry no structure. */
    public get isTrivia() {
        return this.kind === TokenKind.Space || this.kind === TokenKind.Comment;
    }

    public is<Tk extends TokenKind>(kind: Tk): this is Token<Tk> {
        const own: TokenKind = this.kind;
        return own === kind;
    }

    public enforce<Tk extends TKind>(kind: Tk): Token<Tk> {
        if (this.is(kind)) { return this; }
        throw new Error(`expected token kind ${TokenKind[kind]} but got ${TokenKind[this.kind]}`);
    }
}

export enum TokenKind {
    Space,
    Comment,

    Open,
    Close,
    Prefix,

    Atom,
    String,
}
