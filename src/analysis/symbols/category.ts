"use strict";

import { assertNever } from "../../util";

export enum SymbolCategory {
    Function,
    Form,
    Class,
    Method,
}

export type SymbolCategoryKey = "function" | "form" | "class" | "method";

// tslint:disable-next-line:no-namespace
export namespace SymbolCategory {
    /** Every category, in the order lookups try them. */
    export const ALL: ReadonlyArray<SymbolCategory> = [
        SymbolCategory.Function,
        SymbolCategory.Form,
        SymbolCategory.Class,
        SymbolCategory.Method,
    ];

    export function getKey(category: SymbolCategory): SymbolCategoryKey {
        switch (category) {
            case SymbolCategory.Function: return "function";
            case SymbolCategory.Form: return "form";
            case SymbolCategory.Class: return "class";
            case SymbolCategory.Method: return "method";
            default: return assertNever(category);
        }
    }

    export function fromKey(key: string): SymbolCategory | undefined {
        return ALL.find((c) => getKey(c) === key);
    }

    export function getFriendlyName(category: SymbolCategory): string {
        switch (category) {
            case SymbolCategory.Form:
                return "Macro";
            default:
                return SymbolCategory[category];
        }
    }
}
