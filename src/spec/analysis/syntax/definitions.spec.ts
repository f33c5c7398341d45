"use strict";

import { SymbolCategory } from "../../../analysis/symbols/category";
import { parseDeclarationRecords } from "../../../analysis/syntax/definitions/declarations";
import { findSourceDefinitions } from "../../../analysis/syntax/definitions/sourceDefinitions";

describe("parseDeclarationRecords", () => {
    it("reads the name at the head of each record", () => {
        const scan = parseDeclarationRecords(`("alpha" "a b" "Does alpha")\n(beta x)\n`);

        expect(scan).toEqual({ names: ["alpha", "beta"], skipped: 0 });
    });

    it("keeps only names with a wanted prefix", () => {
        const scan = parseDeclarationRecords("(alpha 1)\n(beta 2)", ["al"]);

        expect(scan.names).toEqual(["alpha"]);
    });

    it("skips empty, unclosed and non-list records", () => {
        const scan = parseDeclarationRecords(`(alpha 1) () stray ((x) y) (beta 2) ("gamma" (delta`);

        expect(scan).toEqual({ names: ["alpha", "beta"], skipped: 4 });
    });

    it("ignores comments between records", () => {
        const scan = parseDeclarationRecords("; header\n(alpha) /* (not this) */ (beta)");

        expect(scan.names).toEqual(["alpha", "beta"]);
    });
});

describe("findSourceDefinitions", () => {
    it("finds definitions in both call styles", () => {
        const text = [
            "(defun alpha (x) x)",
            "procedure( beta(y)",
            "  y)",
            "; (defun hidden ()",
            "(defmacro gamma (a) a) (defclass Delta () ())",
            "defmethod( epsilon ((obj Delta)))",
            "nprocedure(zeta(args) args)",
            "(defgeneric eta (obj))",
            "globalProc( theta_2? ()",
        ].join("\r\n");

        expect(Array.from(findSourceDefinitions(text))).toEqual([
            { category: SymbolCategory.Function, line: 0, name: "alpha" },
            { category: SymbolCategory.Function, line: 1, name: "beta" },
            { category: SymbolCategory.Form, line: 4, name: "gamma" },
            { category: SymbolCategory.Class, line: 4, name: "Delta" },
            { category: SymbolCategory.Method, line: 5, name: "epsilon" },
            { category: SymbolCategory.Form, line: 6, name: "zeta" },
            { category: SymbolCategory.Method, line: 7, name: "eta" },
            { category: SymbolCategory.Function, line: 8, name: "theta_2?" },
        ]);
    });

    it("stops at a line comment but not at a semicolon in a string", () => {
        const text = `(print "a;b") (defun kept ()) ; (defun dropped ())`;

        expect(Array.from(findSourceDefinitions(text)).map((d) => d.name)).toEqual(["kept"]);
    });

    it("does not match definer names inside longer words", () => {
        const text = "(defunct x) (my_defun y) xprocedure(z)";

        expect(Array.from(findSourceDefinitions(text))).toEqual([]);
    });
});
