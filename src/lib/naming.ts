/**
 * Name helpers shared by the schema passes and the registry.
 *
 * Path-like references use `.` or `::` between segments, so
 * `blog::post::Entity`, `post.Entity` and `Column.AuthorId` are all accepted.
 */

const SEGMENT_SEPARATOR = /::|\./;

export const splitPath = (reference: string): string[] =>
  reference
    .split(SEGMENT_SEPARATOR)
    .map(segment => segment.trim())
    .filter(segment => segment.length > 0);

export const lastSegment = (reference: string): string => {
  const segments = splitPath(reference);
  return segments[segments.length - 1] ?? reference;
};

/**
 * `post.Entity` names the `post` module; a single bare segment is taken as the
 * entity itself.
 */
export const targetSegment = (reference: string): string => {
  const segments = splitPath(reference);
  if (segments.length >= 2) {
    return segments[segments.length - 2] ?? reference;
  }
  return segments[0] ?? reference;
};

/**
 * `AuthorId` -> `author_id`, `HTTPServer` -> `http_server`. Already snake
 * names come back unchanged.
 */
export const toSnakeCase = (value: string): string =>
  value
    .replace(/([A-Z]+)([A-Z][a-z])/g, '$1_$2')
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .replace(/[-\s]+/g, '_')
    .toLowerCase();

export const toPascalCase = (value: string): string =>
  toSnakeCase(value)
    .split('_')
    .filter(part => part.length > 0)
    .map(part => part.charAt(0).toUpperCase() + part.slice(1))
    .join('');

/**
 * Table name used for entities declared outside the compiled set.
 */
export const defaultTableName = (entityName: string): string => `${toSnakeCase(entityName)}s`;
