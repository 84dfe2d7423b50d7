/**
 * Name normalization for namespaces and dotted name segments.
 *
 * Every place that turns a user-supplied name into a namespace prefix goes
 * through `normalizeToolName`, so a merge followed by a spinoff with the same
 * registry name lands on the same prefix.
 */

const LOWER_UPPER = /([a-z0-9])([A-Z])/g;
const ACRONYM_WORD = /([A-Z]+)([A-Z][a-z])/g;
const NON_ALNUM_RUN = /[^a-z0-9]+/g;

/**
 * Normalize a name: split camelCase with underscores, lowercase, and collapse
 * every run of other characters (underscores included) to one underscore.
 *
 * @example
 * normalizeToolName('getUserIDFromDB'); // 'get_user_id_from_db'
 * normalizeToolName('parse@JSON.data'); // 'parse_json_data'
 */
export function normalizeToolName(name: string): string {
  return name
    .trim()
    .replace(LOWER_UPPER, '$1_$2')
    .replace(ACRONYM_WORD, '$1_$2')
    .toLowerCase()
    .replace(NON_ALNUM_RUN, '_');
}

/**
 * Drop consecutive duplicate segments: `add_add_get` becomes `add_get`.
 */
export function collapseRepeatedSegments(name: string): string {
  const segments = name.split('_');
  return segments.filter((segment, i) => i === 0 || segment !== segments[i - 1]).join('_');
}
