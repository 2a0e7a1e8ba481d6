import { is, type types } from 'estree-toolkit';
import { tryResolveNumericText, tryResolveStaticValue } from './static-resolver';

/**
 * Extracts the static name from a property key written as a non-computed
 * Identifier.
 *
 * In `{ speed: 1 }` the identifier `speed` is a label, not a variable
 * reference. With `computed: true` (`{ [speed]: 1 }`) it *is* a reference, so
 * this function steps aside and lets the static resolver reject it.
 */
function tryExtractNamedKey(property: types.Property): string | null {
  if (!property.computed && is.identifier(property.key)) {
    return property.key.name;
  }
  return null;
}

/**
 * Extracts the key of an object property as document map key text.
 *
 * Pathways:
 * - Named keys (`{ speed: 1 }`)        -> `"speed"`
 * - Literal keys (`{ "max-hp": 1 }`)   -> `"max-hp"`
 * - Numeric keys (`{ 10: "ten" }`)     -> `"10"`, spelled as written
 * - Static computed keys (`` { [`k${1}`]: 0 } ``) -> `"k1"`
 *
 * Key constraints: only strings and numbers are accepted. Booleans, `null`
 * and bigints are rejected even though they stringify, because they are
 * almost certainly authoring mistakes in a configuration file.
 *
 * @param property
 *   The property node to inspect.
 * @returns
 *   The key text, or `null` when the key is dynamic or unsupported.
 */
export function extractPropertyKey(property: types.Property): string | null {
  const namedKey = tryExtractNamedKey(property);
  if (namedKey !== null) {
    return namedKey;
  }

  // Numeric keys keep their source spelling.
  const numeric = tryResolveNumericText(property.key);
  if (numeric.success) {
    return numeric.value.bigint ? null : numeric.value.text;
  }

  const resolution = tryResolveStaticValue(property.key);
  if (resolution.success && typeof resolution.value === 'string') {
    return resolution.value;
  }

  return null;
}
