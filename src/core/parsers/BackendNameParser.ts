/**
 * Backend name parser
 * Turns an external call folder name such as `Call-JDBC to DB - orders_db`
 * into its backend type and display name
 */

import { ParsedBackendName } from '../engine/interfaces';

const CALL_PREFIX = 'Call-';
const TARGET_SEPARATOR = ' to ';
const NAME_SEPARATOR = ' - ';

/**
 * Parse an external call name. Never throws.
 *
 * The display name is everything after the first ` - ` that follows the
 * remote identifier, so `Call-HTTP to SVC - pay - gateway` gives `pay - gateway`.
 * Names that do not follow the grammar come back with `wellFormed: false`:
 * `Call-<TYPE> to <remote>` keeps the remote as name, anything else keeps the
 * raw text as name with an empty type.
 */
export function parseBackendName(raw: string): ParsedBackendName {
  const text = raw.trimStart();

  if (!text.startsWith(CALL_PREFIX)) {
    return { type: '', name: text.trim(), wellFormed: false };
  }

  const rest = text.slice(CALL_PREFIX.length);
  const type = rest.split(/\s/, 1)[0];
  const targetIndex = type ? rest.indexOf(TARGET_SEPARATOR, type.length) : -1;

  if (targetIndex < 0) {
    return { type: '', name: text.trim(), wellFormed: false };
  }

  const target = rest.slice(targetIndex + TARGET_SEPARATOR.length);
  const nameIndex = target.indexOf(NAME_SEPARATOR);

  if (nameIndex < 0) {
    // `Call-HTTP to X -` lost its separator's trailing space
    return { type, name: target.replace(/\s+-\s*$/, '').trim(), wellFormed: false };
  }

  const name = target.slice(nameIndex + NAME_SEPARATOR.length).trim();
  if (!name) {
    return { type, name: target.slice(0, nameIndex).trim(), wellFormed: false };
  }

  return { type, name, wellFormed: true };
}
