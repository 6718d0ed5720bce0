const NAME_REGEX = /^[a-zA-Z0-9_]+$/;

/**
 * Validates a scenario or run name.
 *
 * Names become file names under the data directory, so only letters, digits
 * and underscores are allowed.
 */
export function isValidName(name: string): true | string {
  if (!name || name.length === 0) return 'Name cannot be empty.';
  if (!NAME_REGEX.test(name)) {
    return 'Name must contain only alphanumeric characters and underscores (no spaces).';
  }
  return true;
}
