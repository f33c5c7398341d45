"use strict";

import SExpr, { List } from "../sexpr/sexpr";
import { SExprReader } from "../sexpr/reader";
import tokenize from "../tokens/tokenize";

export interface DeclarationScan {
    /** Declared names, in file order. May contain duplicates. */
    readonly names: string[];
    /** Number of top-level expressions that were not usable records. */
    readonly skipped: number;
}

/**
 * Reads a declaration-record file: a sequence of lists whose first element (an atom or a string)
 * names a function, e.g. `("dbOpen" "d_cellView" "Opens a cell view")`.
 *
 * @param prefixes When not empty, only names starting with one of these are kept.
 */
export function parseDeclarationRecords(text: string, prefixes: ReadonlyArray<string> = []): DeclarationScan {
    const names: string[] = [];
    let skipped = 0;

    for (const expr of SExpr.parseMany(tokenize(text))) {
        const name = recordName(expr);
        if (name === undefined) {
            skipped++;
        } else if (!prefixes.length || prefixes.some((p) => name.startsWith(p))) {
            names.push(name);
        }
    }

    return { names, skipped };
}

function recordName(expr: SExpr): string | undefined {
    if (!(expr instanceof List) || !expr.close) { return; }
    const name = new SExprReader(expr.contents).maybeNextName();
    return name ? name : undefined;
}
