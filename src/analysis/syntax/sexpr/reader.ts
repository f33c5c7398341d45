"use strict";

import Lookahead from "./lookahead";
import SExpr, { Atom, List, Str } from "./sexpr";

export class SExprReader extends Lookahead<SExpr> {
    public maybeNextAtom(): Atom | undefined {
        return this.maybeNext((s): s is Atom => s instanceof Atom);
    }

    public maybeNextString(): Str | undefined {
        return this.maybeNext((s): s is Str => s instanceof Str);
    }

    /** Reads an atom's text or a string's value, whichever comes next. */
    public maybeNextName(): string | undefined {
        const atom = this.maybeNextAtom();
        if (atom) { return atom.token.text; }
        const str = this.maybeNextString();
        return str && str.value;
    }

    public maybeNextList(): List | undefined {
        return this.maybeNext((s): s is List => s instanceof List);
    }
}
