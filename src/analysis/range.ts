"use strict";

import { binarySearch as utilBinarySearch } from "../util";

export class Range {
    public static union(...ranges: Range[]) {
        if (!ranges.length) {
            throw new Error("need at least one range");
        }
        return new Range(
            Math.min(...ranges.map((r) => r.start)),
            Math.max(...ranges.map((r) => r.end)),
        );
    }

    constructor(
        public readonly start: number,
        public readonly end: number) {}

    public compareToOffset(offset: number) {
        if (offset < this.start) { return -1; }
        if (offset >= this.end) { return 1; }
        return 0;
    }
}

export default Range;

export interface HasRange {
    range: Range;
}

export namespace HasRange {
    type MaybeHasRangeOrArray = undefined | HasRange | ReadonlyArray<undefined | HasRange>;

    function pushRanges(dest: Range[], sources: MaybeHasRangeOrArray[]) {
        for (const s of sources) {
            if (isHasRangeArray(s)) {
                pushRanges(dest, [...s]);
            } else if (s) {
                dest.push(s.range);
            }
        }
    }

    function isHasRangeArray(s: MaybeHasRangeOrArray): s is ReadonlyArray<undefined | HasRange> {
        return Array.isArray(s);
    }

    export function unionRanges(...sources: MaybeHasRangeOrArray[]) {
        const ranges = new Array<Range>();
        pushRanges(ranges, sources);
        return Range.union(...ranges);
    }

    function compareToOffset(item: HasRange, offset: number) {
        return item.range.compareToOffset(offset);
    }

    /**
     * Finds the item whose range contains the offset.
     * @returns The index of that item, or the one's complement of the index of the first item
     *          starting after the offset.
     */
    export function binarySearchIndex<T extends HasRange>(items: ReadonlyArray<T>, offset: number) {
        return utilBinarySearch(items, offset, compareToOffset);
    }
}
