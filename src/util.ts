"use strict";

export function assertNever(x: never): never {
    throw new Error(`unexpected value: ${x}`);  // shouldn't get here
}

export function escapeRegExp(text: string): string {
    return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Finds the index of an object in a sorted array, using a comparison function.
 * @param items A sorted array.
 * @param key A value to use to find the object.
 * @param compare A function that accepts an item and the original key, and returns &lt;0 if the key comes before the
 *                item, &gt;0 if it comes after, and 0 if it matches.
 * @returns The index of the item for which compare() returned 0, or if no match, the one's complement of the
 *          index where the item could be inserted (-i - 1).
 */
export function binarySearch<TItem, TKey>(
    items: ReadonlyArray<TItem>, key: TKey, compare: (item: TItem, key: TKey) => number): number {

    let start = 0;
    let end = items.length - 1;
    while (start <= end) {
        const i = Math.floor((start + end) / 2);
        const c = compare(items[i], key);
        if (!c) { return i; }
        if (c < 0) { end = i - 1; } else { start = i + 1; }
    }
    return -start - 1;
}
