"use strict";

import { HasRange, Range } from "../../range";
import { Token, TokenKind } from "../tokens/tokens";

/**
 * A parsed expression tree. The editing engine never builds one of these (it works on tokens so it
 * can cope with text in the middle of an edit); they are for whole files such as declaration records.
 */
abstract class SExpr implements HasRange {
    /**
     * Parses top-level expressions one at a time. Lists are tracked on an explicit stack, so nesting
     * depth is limited only by memory. A list left open at the end of input has no close token.
     */
    public static *parseMany(tokens: Iterable<Token>): IterableIterator<SExpr> {
        // open lists, innermost last; each has the prefixes still waiting for an expression
        const stack: PendingList[] = [];
        let topPrefixes: Array<Token<TokenKind.Prefix>> = [];

        function* complete(expr: SExpr): IterableIterator<SExpr> {
            const top = stack[stack.length - 1];
            const prefixes = top ? top.prefixes : topPrefixes;
            let result = expr;
            for (let prefix = prefixes.pop(); prefix; prefix = prefixes.pop()) {
                result = wrapPrefix(prefix, result);
            }
            if (top) {
                top.contents.push(result);
            } else {
                yield result;
            }
        }

        function* closeList(list: PendingList, close?: Token<TokenKind.Close>): IterableIterator<SExpr> {
            list.contents.push(...list.prefixes.map((p) => new ParseError(p)));
            yield* complete(new List(list.open, list.contents, close));
        }

        for (const token of tokens) {
            if (token.isTrivia) { continue; }
            switch (token.kind) {
                case TokenKind.Open:
                    stack.push({ contents: [], open: token.enforce(TokenKind.Open), prefixes: [] });
                    break;

                case TokenKind.Close: {
                    const list = stack.pop();
                    if (list) {
                        yield* closeList(list, token.enforce(TokenKind.Close));
                    } else {
                        yield* topPrefixes.map((p) => new ParseError(p));
                        topPrefixes = [];
                        yield new ParseError(token);
                    }
                    break;
                }

                case TokenKind.Prefix: {
                    const top = stack[stack.length - 1];
                    (top ? top.prefixes : topPrefixes).push(token.enforce(TokenKind.Prefix));
                    break;
                }

                case TokenKind.Atom:
                    yield* complete(new Atom(token.enforce(TokenKind.Atom)));
                    break;

                case TokenKind.String:
                    yield* complete(new Str(token.enforce(TokenKind.String)));
                    break;

                default:
                    yield* complete(new ParseError(token));
                    break;
            }
        }

        for (let list = stack.pop(); list; list = stack.pop()) {
            yield* closeList(list);
        }
        yield* topPrefixes.map((p) => new ParseError(p));
    }

    protected static getStringParts(expr: SExpr) {
        return expr.toStringParts();
    }

    public abstract range: Range;

    public toString() {
        return Array.from(this.toStringParts()).join("");
    }

    protected abstract toStringParts(): IterableIterator<string>;
}

namespace SExpr {
    export abstract class Bracketed extends SExpr {
        constructor(public readonly open: Token<TokenKind.Open>,
                    public readonly contents: SExpr[],
                    public readonly close?: Token<TokenKind.Close>) {
            super();
        }

        public get range() {
            return HasRange.unionRanges(this.open, this.contents, this.close);
        }

        protected *toStringParts() {
            yield this.open.text;
            for (let i = 0; i < this.contents.length; i++) {
                if (i > 0) { yield " "; }
                yield* SExpr.getStringParts(this.contents[i]);
            }
            if (this.close) {
                yield this.close.text;
            }
        }
    }

    export abstract class Prefixed extends SExpr {
        constructor(public readonly prefix: Token<TokenKind.Prefix>,
                    public readonly inner: SExpr) {
            super();
        }

        public get range() {
            return HasRange.unionRanges(this.prefix, this.inner);
        }

        protected *toStringParts() {
            yield this.prefix.text;
            yield* SExpr.getStringParts(this.inner);
        }
    }

    export abstract class SingleToken extends SExpr {
        constructor(public readonly token: Token) { super(); }

        public get range() { return this.token.range; }

        protected *toStringParts() {
            yield this.token.text;
        }
    }
}

export default SExpr;

export class List extends SExpr.Bracketed { }

// -------------------------------------------------------------------

type PrefixToken<TText extends string> = Token<TokenKind.Prefix> & { text: TText };

export class Quotation extends SExpr.Prefixed {
    public readonly prefix!: PrefixToken<"'">;
}
export class Quasiquotation extends SExpr.Prefixed {
    public readonly prefix!: PrefixToken<"`">;
}
export class Unquotation extends SExpr.Prefixed {
    public readonly prefix!: PrefixToken<",">;
}
export class SplicedUnquotation extends SExpr.Prefixed {
    public readonly prefix!: PrefixToken<",@">;
}

interface PendingList {
    open: Token<TokenKind.Open>;
    contents: SExpr[];
    prefixes: Array<Token<TokenKind.Prefix>>;
}

function wrapPrefix(prefix: Token<TokenKind.Prefix>, inner: SExpr): SExpr {
    const entry = PREFIX_MATCH.get(prefix.text);
    if (!entry) { throw new Error(`unmatchable prefix "${prefix.text}"`); }
    return new entry.ctor(prefix, inner);
}

interface PrefixMatchEntry {
    ctor: PrefixedCtor;
}

type PrefixedCtor = new (prefix: Token<TokenKind.Prefix>, inner: SExpr) => SExpr.Prefixed;

const PREFIX_MATCH = new Map<string, PrefixMatchEntry>([
    ["'", { ctor: Quotation }],
    ["`", { ctor: Quasiquotation }],
    [",", { ctor: Unquotation }],
    [",@", { ctor: SplicedUnquotation }],
]);

// -------------------------------------------------------------------

/** A token that cannot start an expression here, such as a stray close paren. */
export class ParseError extends SExpr.SingleToken { }

export class Atom extends SExpr.SingleToken {
    public readonly token!: Token<TokenKind.Atom>;
}

export class Str extends SExpr.SingleToken {
    public readonly token!: Token<TokenKind.String>;

    /** The string's contents with the quotes removed and escapes resolved. */
    public get value(): string {
        return this.token.text.slice(1, -1).replace(/\\([\s\S])/g, (_, c: string) => ESCAPES.get(c) || c);
    }
}

const ESCAPES = new Map<string, string>([
    ["n", "\n"],
    ["t", "\t"],
    ["r", "\r"],
]);
