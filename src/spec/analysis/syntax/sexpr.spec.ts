"use strict";

import Range from "../../../analysis/range";
import { SExprReader } from "../../../analysis/syntax/sexpr/reader";
import SExpr, { Atom, List, ParseError, Quotation, Str } from "../../../analysis/syntax/sexpr/sexpr";
import tokenize from "../../../analysis/syntax/tokens/tokenize";
import { Token, TokenKind } from "../../../analysis/syntax/tokens/tokens";

function parse(text: string): SExpr[] {
    return Array.from(SExpr.parseMany(tokenize(text)));
}

describe("SExpr.parseMany", () => {
    it("yields no exprs for an empty input", () => {
        expect(parse("")).toEqual([]);
    });

    it("yields single token exprs for unstructured inputs", () => {
        expect(parse("a b c")).toEqual([
            new Atom(new Token(TokenKind.Atom, "a", new Range(0, 1))),
            new Atom(new Token(TokenKind.Atom, "b", new Range(2, 3))),
            new Atom(new Token(TokenKind.Atom, "c", new Range(4, 5))),
        ]);
    });

    it("yields structured exprs for structured inputs", () => {
        //                      1
        //            0123456789012
        expect(parse("(a b c) '(d)")).toEqual([
            new List(
                new Token(TokenKind.Open, "(", new Range(0, 1)),
                [
                    new Atom(new Token(TokenKind.Atom, "a", new Range(1, 2))),
                    new Atom(new Token(TokenKind.Atom, "b", new Range(3, 4))),
                    new Atom(new Token(TokenKind.Atom, "c", new Range(5, 6))),
                ],
                new Token(TokenKind.Close, ")", new Range(6, 7)),
            ),
            new Quotation(
                new Token(TokenKind.Prefix, "'", new Range(8, 9)),
                new List(
                    new Token(TokenKind.Open, "(", new Range(9, 10)),
                    [new Atom(new Token(TokenKind.Atom, "d", new Range(10, 11)))],
                    new Token(TokenKind.Close, ")", new Range(11, 12)),
                ),
            ),
        ]);
    });

    it("leaves an unclosed list without a close token", () => {
        const [list] = parse("(a (b)");

        expect(list instanceof List).toBe(true);
        expect(list instanceof List && list.close).toBeUndefined();
        expect(list.range).toEqual(new Range(0, 6));
    });

    it("parses deeply nested lists", () => {
        const depth = 50000;
        let expr = parse("(".repeat(depth) + ")".repeat(depth))[0];
        let levels = 0;
        while (expr instanceof List) {
            levels++;
            expr = expr.contents[0];
        }

        expect(levels).toBe(depth);
    });

    it("reports prefixes with nothing to quote as parse errors", () => {
        const [list, stray] = parse("(a ') '");

        expect(list instanceof List && list.contents.map((e) => e.constructor)).toEqual([Atom, ParseError]);
        expect(stray instanceof ParseError && stray.token.text).toBe("'");
    });

    it("reports a stray close paren as a parse error", () => {
        const exprs = parse(") a");

        expect(exprs[0] instanceof ParseError).toBe(true);
        expect(exprs[1] instanceof Atom).toBe(true);
    });

    it("prints exprs back as text", () => {
        expect(parse("( a  'b \"c\" )").map(String)).toEqual(["(a 'b \"c\")"]);
    });
});

describe("Str", () => {
    it("resolves escapes in its value", () => {
        const [str] = parse(`"a\\"b\\nc"`);

        expect(str instanceof Str && str.value).toBe("a\"b\nc");
    });
});

describe("SExprReader", () => {
    it("reads names from atoms and strings", () => {
        const reader = new SExprReader(parse(`foo "bar" (baz)`));

        expect(reader.maybeNextName()).toBe("foo");
        expect(reader.maybeNextName()).toBe("bar");
        expect(reader.maybeNextName()).toBeUndefined();
        expect(reader.maybeNextList() instanceof List).toBe(true);
        expect(reader.eof).toBe(true);
    });

    it("leaves non-matching exprs in place", () => {
        const reader = new SExprReader(parse("(x) y"));

        expect(reader.maybeNextAtom()).toBeUndefined();
        expect(reader.maybeNextString()).toBeUndefined();
        expect(reader.next() instanceof List).toBe(true);
        expect(reader.maybeNextAtom() instanceof Atom).toBe(true);
    });
});
