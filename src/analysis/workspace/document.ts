"use strict";

import { binarySearch } from "../../util";

/** Read access to the text being edited. Offsets, lines and columns are zero-based. */
export interface TextBuffer {
    length(): number;
    readRange(start: number, end: number): string;
    lineAt(offset: number): number;
    columnAt(offset: number): number;
    lineStart(line: number): number;
    lineCount(): number;
}

export interface EditableBuffer extends TextBuffer {
    replaceRange(start: number, end: number, text: string): void;
}

export type TextSource = string | TextBuffer;

export function textOf(source: TextSource): string {
    return typeof source === "string" ? source : source.readRange(0, source.length());
}

export class StringDocument implements EditableBuffer {
    private text: string;
    private lineStarts: number[] = [];
    private currentVersion = 1;

    constructor(text: string) {
        this.text = text;
        this.computeLineStarts();
    }

    public get version() {
        return this.currentVersion;
    }

    public getText() {
        return this.text;
    }

    public length() {
        return this.text.length;
    }

    public readRange(start: number, end: number) {
        return this.text.substring(start, end);
    }

    public lineAt(offset: number) {
        const clamped = Math.max(0, Math.min(offset, this.text.length));
        const i = binarySearch(this.lineStarts, clamped, (start, key) => key - start);
        return i >= 0 ? i : -i - 2;
    }

    public columnAt(offset: number) {
        const clamped = Math.max(0, Math.min(offset, this.text.length));
        return clamped - this.lineStarts[this.lineAt(clamped)];
    }

    public lineStart(line: number) {
        if (line < 0 || line >= this.lineStarts.length) {
            throw new Error(`line ${line} out of range (0-${this.lineStarts.length - 1})`);
        }
        return this.lineStarts[line];
    }

    public lineCount() {
        return this.lineStarts.length;
    }

    public replaceRange(start: number, end: number, text: string) {
        if (start < 0 || end < start || end > this.text.length) {
            throw new Error(`invalid range [${start}, ${end}) for a document of length ${this.text.length}`);
        }
        this.text = this.text.substring(0, start) + text + this.text.substring(end);
        this.currentVersion++;
        this.computeLineStarts();
    }

    private computeLineStarts() {
        this.lineStarts = [0];
        for (let i = this.text.indexOf("\n"); i >= 0; i = this.text.indexOf("\n", i + 1)) {
            this.lineStarts.push(i + 1);
        }
    }
}

/** Text of a line, without its line terminator. */
export function getLineText(buffer: TextBuffer, line: number): string {
    const start = buffer.lineStart(line);
    const end = line + 1 < buffer.lineCount() ? buffer.lineStart(line + 1) - 1 : buffer.length();
    const text = buffer.readRange(start, end);
    return text.endsWith("\r") ? text.slice(0, -1) : text;
}

export interface LineIndentation {
    /** Offset of the first character of the line. */
    readonly start: number;
    /** Number of leading blank characters. */
    readonly width: number;
    /** Whether the line holds nothing but blanks. */
    readonly blank: boolean;
}

export function getLineIndentation(buffer: TextBuffer, line: number): LineIndentation {
    const text = getLineText(buffer, line);
    const match = /^[ \t]*/.exec(text);
    const width = match ? match[0].length : 0;
    return { start: buffer.lineStart(line), width, blank: width === text.length };
}

/**
 * Replaces the leading blanks of a line with `column` spaces.
 * @returns Whether the text changed.
 */
export function setLineIndentation(buffer: EditableBuffer, line: number, column: number): boolean {
    const { start, width } = getLineIndentation(buffer, line);
    const indentation = " ".repeat(Math.max(0, column));
    if (buffer.readRange(start, start + width) === indentation) {
        return false;
    }
    buffer.replaceRange(start, start + width, indentation);
    return true;
}
