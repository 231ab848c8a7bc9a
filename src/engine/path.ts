/**
 * Field paths used to attribute validation errors.
 *
 * @packageDocumentation
 */

/**
 * A field name, mapping key (string) or sequence index (number).
 */
export type PathSegment = string | number;

/**
 * Location of a value within the raw tree, outermost segment first.
 */
export type FieldPath = readonly PathSegment[];

const IDENTIFIER = /^[A-Za-z_$][\w$]*$/;

/**
 * Returns a new path with `segment` appended.
 */
export function appendPath(path: FieldPath, segment: PathSegment): FieldPath {
  return [...path, segment];
}

/**
 * Renders a path for humans.
 *
 * Identifier-like segments are dotted, indices are bracketed, and any other
 * key is bracketed and quoted. The empty path renders as `<root>`.
 *
 * @example
 * ```typescript
 * formatPath(['ROW_NAMES', 'TOTAL_ROW']); // "ROW_NAMES.TOTAL_ROW"
 * formatPath(['ROWS', 1, 'LABEL']);       // "ROWS[1].LABEL"
 * formatPath(['BY_YEAR', '2024']);        // 'BY_YEAR["2024"]'
 * ```
 */
export function formatPath(path: FieldPath): string {
  if (path.length === 0) {
    return '<root>';
  }

  let rendered = '';
  path.forEach((segment, index) => {
    if (typeof segment === 'number') {
      rendered += `[${String(segment)}]`;
    } else if (IDENTIFIER.test(segment)) {
      rendered += index === 0 ? segment : `.${segment}`;
    } else {
      rendered += `[${JSON.stringify(segment)}]`;
    }
  });
  return rendered;
}
