"use strict";

/** An iterator wrapper that can look at upcoming items without consuming them. */
export default class Lookahead<T> {
    public get eof(): boolean {
        return this.peek() === undefined;
    }

    private source: Iterator<T>;
    private sourceDone = false;
    private pushedBack: T[] = [];

    constructor(source: Iterable<T>) {
        this.source = source[Symbol.iterator]();
    }

    public peek<U extends T>(predicate: (v: T) => v is U): U | undefined;
    public peek(predicate?: (v: T) => boolean): T | undefined;

    public peek(predicate?: (v: T) => boolean): T | undefined {
        const result = this.next();
        if (typeof result === "undefined") { return; }
        this.pushedBack.push(result);
        if (predicate && !predicate(result)) { return; }
        return result;
    }

    public next(): T | undefined {
        if (this.pushedBack.length) {
            return this.pushedBack.pop();
        }
        if (this.sourceDone) { return; }
        const result = this.source.next();
        if (result.done) {
            this.sourceDone = true;
            return;
        }
        return result.value;
    }

    public maybeNext<U extends T>(predicate: (v: T) => v is U): U | undefined;
    public maybeNext(predicate?: (v: T) => boolean): T | undefined;

    public maybeNext(predicate?: (v: T) => boolean): T | undefined {
        const result = this.peek(predicate);
        if (typeof result !== "undefined") {
            this.next();
        }
        return result;
    }
}
