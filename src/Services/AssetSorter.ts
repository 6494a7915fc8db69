import type { Asset } from '../Domain/Asset.js';
import { ValidationError } from '../Common/Errors.js';

/** Orderings offered to the presentation layer. */
export const SORT_METHODS = [`newest`, `oldest`, `name-asc`, `name-desc`, `category-asc`, `category-desc`] as const;

export type SortMethod = (typeof SORT_METHODS)[number];

type Comparator = (a: Asset, b: Asset) => number;

const collator = new Intl.Collator(undefined, { sensitivity: `base` });

const byName: Comparator = (a, b) => {
    return collator.compare(a.name, b.name);
};

const byCategory: Comparator = (a, b) => {
    return collator.compare(a.category, b.category) || byName(a, b);
};

const byCreated: Comparator = (a, b) => {
    return a.createdAt.getTime() - b.createdAt.getTime();
};

const COMPARATORS: Record<SortMethod, Comparator> = {
    'newest': (a, b) => {
        return byCreated(b, a);
    },
    'oldest': byCreated,
    'name-asc': byName,
    'name-desc': (a, b) => {
        return byName(b, a);
    },
    'category-asc': byCategory,
    'category-desc': (a, b) => {
        return byCategory(b, a);
    },
};

export function IsSortMethod(value: unknown): value is SortMethod {
    return typeof value === `string` && SORT_METHODS.some(method => {
        return method === value;
    });
}

/**
 * Returns a sorted copy; the input is left untouched. Text comparison ignores case,
 * and equal keys keep their input order.
 * @throws ValidationError for an unknown method
 * @example
 * SortAssets(manager.getAllAssets(), 'name-asc');
 */
export function SortAssets(assets: readonly Asset[], method: SortMethod): Asset[] {
    if (!IsSortMethod(method)) {
        throw new ValidationError(`Unknown sort method: ${String(method)}`, { method });
    }
    return [...assets].sort(COMPARATORS[method]);
}
