"use strict";

import { SymbolCategory } from "../../symbols/category";
import { escapeRegExp } from "../../../util";

export interface SourceDefinition {
    readonly category: SymbolCategory;
    readonly name: string;
    /** Zero-based line of the defining word. */
    readonly line: number;
}

const DEFINERS: ReadonlyArray<{ words: string[], category: SymbolCategory }> = [
    { words: ["defun", "procedure", "globalProc"], category: SymbolCategory.Function },
    { words: ["defmacro", "mprocedure", "nprocedure"], category: SymbolCategory.Form },
    { words: ["defclass"], category: SymbolCategory.Class },
    { words: ["defmethod", "defgeneric"], category: SymbolCategory.Method },
];

const DEFINER_MAP = new Map<string, SymbolCategory>();
for (const d of DEFINERS) {
    for (const word of d.words) {
        DEFINER_MAP.set(word, d.category);
    }
}

const IDENTIFIER = "[A-Za-z_][A-Za-z0-9_?]*";
const DEFINER_WORDS = Array.from(DEFINER_MAP.keys()).map(escapeRegExp).join("|");

// (defun name ...) or defun( name ...)
const DEFINITION_REGEX = new RegExp(
    `\\(\\s*(${DEFINER_WORDS})\\s+(${IDENTIFIER})|\\b(${DEFINER_WORDS})\\(\\s*(${IDENTIFIER})`);

/** Finds definitions in source text, one line at a time. Definitions inside `;` comments are ignored. */
export function* findSourceDefinitions(text: string): IterableIterator<SourceDefinition> {
    const regex = new RegExp(DEFINITION_REGEX.source, "g");
    const lines = text.split(/\r?\n/);
    for (let line = 0; line < lines.length; line++) {
        const lineText = lines[line];
        const limit = commentStart(lineText);

        regex.lastIndex = 0;
        let match: RegExpExecArray | null;
        // tslint:disable-next-line:no-conditional-assignment
        while (match = regex.exec(lineText)) {
            if (match.index >= limit) { break; }
            const definer = match[1] || match[3];
            const name = match[2] || match[4];
            const category = DEFINER_MAP.get(definer);
            if (category !== undefined) {
                yield { category, line, name };
            }
        }
    }
}

/** Offset of the `;` starting a line comment, or the line length if there is none. */
function commentStart(lineText: string): number {
    let inString = false;
    for (let i = 0; i < lineText.length; i++) {
        const c = lineText[i];
        if (inString) {
            if (c === "\\") {
                i++;
            } else if (c === "\"") {
                inString = false;
            }
        } else if (c === "\"") {
            inString = true;
        } else if (c === ";") {
            return i;
        }
    }
    return lineText.length;
}
