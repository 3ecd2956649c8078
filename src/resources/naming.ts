import { ValidationError } from '../errors';

// Names become `<directory>/<name>.log`, so nothing that leaves the directory.
const RESERVED_NAMES = new Set(['.', '..']);
const FORBIDDEN_CHARACTERS = /[\/\\\0]/;

/**
 * Check a resource name against the naming rules. Any non-empty string is
 * accepted unless it would not form a plain file name.
 * @returns The name, unchanged
 * @throws ValidationError on field `name`
 */
export function validateResourceName(name: string): string {
  if (name.length === 0) {
    throw new ValidationError('name', 'Resource name must not be empty');
  }

  if (RESERVED_NAMES.has(name)) {
    throw new ValidationError('name', `Resource name must not be '${name}'`);
  }

  if (FORBIDDEN_CHARACTERS.test(name)) {
    throw new ValidationError('name', 'Resource name must not contain path separators or NUL characters');
  }

  return name;
}
