import { ValidationError } from '../Common/Errors.js';

/**
 * Validates a category name. Categories double as folder names under the library root,
 * so separators, dot-names and leading dots (reserved for `.asset_db`) are refused.
 * @returns string - The trimmed name
 * @throws ValidationError
 * @example
 * ValidateCategoryName(' Materials '); // 'Materials'
 */
export function ValidateCategoryName(name: unknown): string {
    if (typeof name !== `string`) {
        throw new ValidationError(`Category name must be a string`, { name });
    }
    const trimmed = name.trim();

    if (trimmed.length === 0) {
        throw new ValidationError(`Category name must not be empty`);
    }
    if (/[\\/:*?"<>|\u0000-\u001f]/.test(trimmed)) {
        throw new ValidationError(`Category name contains characters not allowed in folder names`, { name: trimmed });
    }
    if (trimmed.startsWith(`.`)) {
        throw new ValidationError(`Category name must not start with '.'`, { name: trimmed });
    }
    return trimmed;
}
