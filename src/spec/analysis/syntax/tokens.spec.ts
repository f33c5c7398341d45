"use strict";

import Range from "../../../analysis/range";
import { scan, TokenIndex } from "../../../analysis/syntax/tokens/tokenIndex";
import tokenize from "../../../analysis/syntax/tokens/tokenize";
import { Token, TokenKind } from "../../../analysis/syntax/tokens/tokens";
import { StringDocument } from "../../../analysis/workspace/document";

describe("tokenize", () => {
    it("yields no tokens for an empty input", () => {
        const tokens = Array.from(tokenize(""));

        expect(tokens).toEqual([]);
    });

    it("tokenizes a form", () => {
        const tokens = Array.from(tokenize("(foo 'bar)"));

        expect(tokens).toEqual([
            new Token(TokenKind.Open, "(", new Range(0, 1)),
            new Token(TokenKind.Atom, "foo", new Range(1, 4)),
            new Token(TokenKind.Space, " ", new Range(4, 5)),
            new Token(TokenKind.Prefix, "'", new Range(5, 6)),
            new Token(TokenKind.Atom, "bar", new Range(6, 9)),
            new Token(TokenKind.Close, ")", new Range(9, 10)),
        ]);
    });

    it("reads from a buffer", () => {
        const doc = new StringDocument("(a)");
        const kinds = Array.from(tokenize(doc)).map((t) => t.kind);

        expect(kinds).toEqual([TokenKind.Open, TokenKind.Atom, TokenKind.Close]);
    });

    it("handles strings with escaped quote marks", () => {
        const tokens = Array.from(tokenize(`hello "embedded\\"quote" goodbye`));

        expect(tokens).toEqual([
            new Token(TokenKind.Atom, "hello", new Range(0, 5)),
            new Token(TokenKind.Space, " ", new Range(5, 6)),
            new Token(TokenKind.String, "\"embedded\\\"quote\"", new Range(6, 23)),
            new Token(TokenKind.Space, " ", new Range(23, 24)),
            new Token(TokenKind.Atom, "goodbye", new Range(24, 31)),
        ]);
    });

    it("treats parens inside strings as text", () => {
        const tokens = Array.from(tokenize(`("a)b")`));

        expect(tokens.map((t) => t.text)).toEqual(["(", "\"a)b\"", ")"]);
    });

    it("reads line comments up to the end of the line", () => {
        const tokens = Array.from(tokenize("a ; note\nb"));

        expect(tokens).toEqual([
            new Token(TokenKind.Atom, "a", new Range(0, 1)),
            new Token(TokenKind.Space, " ", new Range(1, 2)),
            new Token(TokenKind.Comment, "; note", new Range(2, 8)),
            new Token(TokenKind.Space, "\n", new Range(8, 9)),
            new Token(TokenKind.Atom, "b", new Range(9, 10)),
        ]);
    });

    it("nests block comments", () => {
        const tokens = Array.from(tokenize("x /* a /* b */ c */ y"));

        expect(tokens).toEqual([
            new Token(TokenKind.Atom, "x", new Range(0, 1)),
            new Token(TokenKind.Space, " ", new Range(1, 2)),
            new Token(TokenKind.Comment, "/* a /* b */ c */", new Range(2, 19)),
            new Token(TokenKind.Space, " ", new Range(19, 20)),
            new Token(TokenKind.Atom, "y", new Range(20, 21)),
        ]);
    });

    it("reads splicing and quasi-quoting prefixes", () => {
        const tokens = Array.from(tokenize("`(a ,@b)"));

        expect(tokens.map((t) => [t.kind, t.text])).toEqual([
            [TokenKind.Prefix, "`"],
            [TokenKind.Open, "("],
            [TokenKind.Atom, "a"],
            [TokenKind.Space, " "],
            [TokenKind.Prefix, ",@"],
            [TokenKind.Atom, "b"],
            [TokenKind.Close, ")"],
        ]);
    });

    it("allows quote characters and @ inside atoms", () => {
        const tokens = Array.from(tokenize("a'b @key"));

        expect(tokens.map((t) => [t.kind, t.text])).toEqual([
            [TokenKind.Atom, "a'b"],
            [TokenKind.Space, " "],
            [TokenKind.Atom, "@key"],
        ]);
    });

    it("stops at an unterminated string", () => {
        const tokens = Array.from(tokenize(`(foo "bar`));

        expect(tokens.map((t) => t.text)).toEqual(["(", "foo", " "]);
    });

    it("stops at an unterminated block comment", () => {
        const tokens = Array.from(tokenize("a /* b"));

        expect(tokens.map((t) => t.text)).toEqual(["a", " "]);
    });
});

describe("Token", () => {
    it("narrows with enforce", () => {
        const token: Token = new Token(TokenKind.Atom, "x", new Range(0, 1));

        expect(token.enforce(TokenKind.Atom).text).toBe("x");
        expect(() => token.enforce(TokenKind.Open)).toThrowError("expected token kind Open but got Atom");
    });

    it("knows which kinds are trivia", () => {
        const tokens = Array.from(tokenize("a ;c\n/* d */"));

        expect(tokens.map((t) => t.isTrivia)).toEqual([false, true, true, true, true]);
    });
});

describe("scan", () => {
    it("finds the token containing or after an offset going forward", () => {
        expect(scan("(a b)", 2, "forward")).toEqual(new Token(TokenKind.Space, " ", new Range(2, 3)));
        expect(scan("(a b)", 5, "forward")).toBeUndefined();
    });

    it("finds the token starting before an offset going backward", () => {
        expect(scan("(a b)", 2, "backward")).toEqual(new Token(TokenKind.Atom, "a", new Range(1, 2)));
        expect(scan("(a b)", 0, "backward")).toBeUndefined();
    });
});

describe("TokenIndex", () => {
    const index = TokenIndex.of("(a ; c\n b)");

    it("skips trivia unless asked for it", () => {
        expect(index.scan(3, "forward")).toEqual(new Token(TokenKind.Atom, "b", new Range(8, 9)));
        expect(index.scan(3, "forward", { trivia: true }))
            .toEqual(new Token(TokenKind.Comment, "; c", new Range(3, 6)));
    });

    it("searches backward from the middle of a token", () => {
        expect(index.scan(8, "backward")).toEqual(new Token(TokenKind.Atom, "a", new Range(1, 2)));
        expect(index.scan(9, "backward")).toEqual(new Token(TokenKind.Atom, "b", new Range(8, 9)));
    });

    it("pairs matching delimiters", () => {
        // significant tokens: ( a ( b ) c ) )
        const nested = TokenIndex.of("(a (b) c))");

        expect([0, 1, 2, 4, 6, 7].map((i) => nested.partnerOf(i))).toEqual([6, -1, 4, 2, 0, -1]);
        expect(nested.partnerOf(99)).toBe(-1);
    });
});
