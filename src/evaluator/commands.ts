"use strict";

import tokenize from "../analysis/syntax/tokens/tokenize";

/** Escapes text for use inside a double-quoted string literal. */
export function quoteString(text: string): string {
    return text.replace(/[\\"\n\r\t]/g, (c) => {
        switch (c) {
            case "\n": return "\\n";
            case "\r": return "\\r";
            case "\t": return "\\t";
            default: return "\\" + c;
        }
    });
}

/**
 * Turns code into a single line: comments are dropped, runs of whitespace become one space, and
 * line breaks inside strings are escaped.
 * @throws {Error} if the code ends inside a string or block comment.
 */
export function collapseStatement(code: string): string {
    const parts: string[] = [];
    let consumed = 0;
    let pendingSpace = false;

    for (const token of tokenize(code)) {
        consumed = token.end;
        if (token.isTrivia) {
            pendingSpace = true;
            continue;
        }
        if (pendingSpace && parts.length) {
            parts.push(" ");
        }
        pendingSpace = false;
        parts.push(token.text.replace(/\r?\n/g, "\\n"));
    }

    if (consumed < code.length) {
        throw new Error(`unterminated string or comment at offset ${consumed}`);
    }
    return parts.join("");
}

/** A statement that prints `text` followed by a newline. */
export function printCommand(text: string): string {
    return `(printf "%s\\n" "${quoteString(text)}")`;
}

/** A statement that evaluates `code`. */
export function evalCommand(code: string): string {
    return collapseStatement(code);
}

/** Statements that echo `code` and then evaluate it, printing the result. */
export function echoEvalCommands(code: string): string[] {
    const statement = collapseStatement(code);
    return [printCommand(statement), `(println ${statement})`];
}
