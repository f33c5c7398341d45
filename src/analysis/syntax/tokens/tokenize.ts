"use strict";

import Range from "../../range";
import { TextSource, textOf } from "../../workspace/document";
import { Token, TokenKind } from "./tokens";

// an atom may not start with a prefix character, but may contain one
const ATOM_REGEX = /(?:\\[\s\S]?|[^\s()";'`,\\/]|\/(?!\*))(?:\\[\s\S]?|[^\s()";\\/]|\/(?!\*))*/;
const CLOSE_REGEX = /\)/;
const LINE_COMMENT_REGEX = /;[^\r\n]*/;
const OPEN_REGEX = /\(/;
const PREFIX_REGEX = /,@|['`,]/;
const SPACE_REGEX = /\s+/;
const STRING_REGEX = /"(?:\\[\s\S]|[^"\\])*"/;

const TOKEN_REGEX = new RegExp(
    // must match up with TOKEN_MATCH_TYPES below
    [SPACE_REGEX, LINE_COMMENT_REGEX, OPEN_REGEX, CLOSE_REGEX,
     STRING_REGEX, PREFIX_REGEX, ATOM_REGEX]
    .map((re) => `(${re.source})`).join("|"),
    "y");
const TOKEN_MATCH_TYPES: TokenKind[] = [
    TokenKind.Space, TokenKind.Comment, TokenKind.Open, TokenKind.Close,
    TokenKind.String, TokenKind.Prefix, TokenKind.Atom];

const BLOCK_COMMENT_MARKER_REGEX = /\/\*|\*\//g;

/**
 * Splits text into tokens. Every character is covered, except that an unterminated string or
 * block comment ends the stream: the text is assumed to be in the middle of an edit.
 */
function* tokenize(source: TextSource): IterableIterator<Token> {
    const inputText = textOf(source);
    let pos = 0;

    while (pos < inputText.length) {
        if (inputText.startsWith("/*", pos)) {
            const end = findBlockCommentEnd(inputText, pos);
            if (end === undefined) { return; }
            yield mktoken(TokenKind.Comment, pos, end);
            pos = end;
            continue;
        }

        TOKEN_REGEX.lastIndex = pos;
        const match = TOKEN_REGEX.exec(inputText);
        if (!match) {
            // only an unterminated string gets here
            return;
        }
        let type: TokenKind | undefined;
        for (let i = 1; i < match.length; i++) {
            if (match[i] !== undefined) {
                type = TOKEN_MATCH_TYPES[i - 1];
                break;
            }
        }
        if (type === undefined) {
            throw new Error("BUG");
        }
        const end = match.index + match[0].length;
        yield mktoken(type, pos, end);
        pos = end;
    }

    // helper
    function mktoken(kind: TokenKind, rangeStart: number, rangeEnd: number): Token {
        return new Token(kind, inputText.substring(rangeStart, rangeEnd), new Range(rangeStart, rangeEnd));
    }
}

/** Block comments nest: `/* a /* b *\/ c *\/` is one comment. */
function findBlockCommentEnd(text: string, start: number): number | undefined {
    const markers = new RegExp(BLOCK_COMMENT_MARKER_REGEX.source, "g");
    markers.lastIndex = start;
    let depth = 0;
    let match: RegExpExecArray | null;
    // tslint:disable-next-line:no-conditional-assignment
    while (match = markers.exec(text)) {
        depth += match[0] === "/*" ? 1 : -1;
        if (depth === 0) {
            return match.index + match[0].length;
        }
    }
    return undefined;
}

export default tokenize;
