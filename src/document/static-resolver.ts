import { is, type types } from 'estree-toolkit';

/**
 * Represents a successful static resolution.
 *
 * The returned `value` is what the node **evaluates to** under JavaScript
 * evaluation rules, restricted to the forms a configuration document may use.
 */
export type StaticSuccess<T> = {
  success: true;
  value: T;
};

/**
 * Represents a failed static resolution: the node is not a supported
 * constant form. Failure carries no payload.
 */
export type StaticFailure = {
  success: false;
};

/**
 * Discriminated union representing the outcome of a static resolution attempt.
 */
export type StaticResult<T = unknown> = StaticSuccess<T> | StaticFailure;

/**
 * Values a document scalar may be resolved from.
 */
export type StaticScalar = string | number | bigint | boolean | null;

/**
 * Canonical failure sentinel for "unresolvable".
 *
 * Shared sentinel avoids repeated object allocation at failure sites.
 */
export const UNRESOLVED: StaticFailure = { success: false } as const;

/**
 * Constructs a successful static resolution result.
 */
export function resolved<T>(value: T): StaticSuccess<T> {
  return { success: true, value };
}

/**
 * Resolves atomic values from ESTree `Literal` nodes.
 *
 * Supported: `string`, `number`, `boolean`, `bigint` and `null`.
 * Regular expression literals are rejected: they have no scalar text form a
 * configuration value could round-trip through.
 */
function tryResolveLiteral(node: types.Node): StaticResult<StaticScalar> {
  if (is.literal(node)) {
    switch (typeof node.value) {
      case 'string':
      case 'number':
      case 'boolean':
      case 'bigint':
        return resolved(node.value);

      case 'object':
        if (node.value === null) return resolved(null);
        break;
    }
  }
  return UNRESOLVED;
}

/**
 * Resolves the global numeric constants `NaN` and `Infinity`.
 *
 * They are Identifiers syntactically but constants semantically; float
 * members accept both spellings. `undefined` is deliberately not resolved:
 * a document value is either present or absent, and `null` already spells
 * "empty".
 */
function tryResolveIdentifier(node: types.Node): StaticResult<StaticScalar> {
  if (is.identifier(node)) {
    switch (node.name) {
      case 'NaN':
        return resolved(NaN);
      case 'Infinity':
        return resolved(Infinity);
    }
  }
  return UNRESOLVED;
}

/**
 * Resolves sign prefixes on numeric operands: `-5`, `+2.5`, `-Infinity`,
 * `-10n`.
 *
 * ESTree has no negative numeric literal; `-5` is a `UnaryExpression` around
 * the literal `5`, so without this step negative numbers could not be written.
 */
function tryResolveSigned(node: types.Node): StaticResult<StaticScalar> {
  if (!is.unaryExpression(node)) return UNRESOLVED;
  if (node.operator !== '-' && node.operator !== '+') return UNRESOLVED;

  const operand = tryResolveStaticValue(node.argument);
  if (!operand.success) return UNRESOLVED;

  const value = operand.value;
  if (typeof value === 'number') {
    return resolved(node.operator === '-' ? -value : value);
  }
  // Unary plus on a bigint is a TypeError at runtime; only negation is static.
  if (typeof value === 'bigint' && node.operator === '-') {
    return resolved(-value);
  }
  return UNRESOLVED;
}

/**
 * Resolves template literals whose interpolations are themselves static,
 * e.g. `` `v${2}` `` -> `"v2"`.
 *
 * A quasi with an invalid escape sequence has `cooked === null` (tagged
 * template semantics) and makes the whole template unresolvable.
 */
function tryResolveTemplate(node: types.Node): StaticResult<StaticScalar> {
  if (!is.templateLiteral(node)) return UNRESOLVED;

  const parts: string[] = [];
  const expressions = node.expressions;

  for (const [index, quasi] of node.quasis.entries()) {
    const text = quasi.value.cooked;
    if (typeof text !== 'string') return UNRESOLVED;

    parts.push(text);

    if (index < expressions.length) {
      const expression = expressions[index];
      if (!expression) return UNRESOLVED;

      const result = tryResolveStaticValue(expression);
      if (!result.success) return UNRESOLVED;

      parts.push(`${result.value}`);
    }
  }

  return resolved(parts.join(''));
}

/**
 * A number as written in the document, before any conversion to a JS value.
 */
export type NumericText = {
  text: string;
  bigint: boolean;
};

const SIGN = /^[+-]/;

/**
 * Source text of a `number` or `bigint` literal.
 *
 * The raw text is kept so that 64-bit integers beyond 2^53 and forms such as
 * `1.0` or `0x10` reach the scalar parser unchanged. Numeric separators are
 * dropped and a bigint loses its `n` suffix.
 */
function tryResolveNumericLiteral(node: types.Node): StaticResult<NumericText> {
  if (!is.literal(node)) return UNRESOLVED;

  if ('bigint' in node) {
    const raw = node.raw?.replace(/n$/, '') ?? node.bigint;
    return resolved({ text: raw.replaceAll('_', ''), bigint: true });
  }

  if (typeof node.value !== 'number') return UNRESOLVED;
  const raw = node.raw ?? String(node.value);
  return resolved({ text: raw.replaceAll('_', ''), bigint: false });
}

function applySign(operator: '-' | '+', text: string): string {
  if (operator === '+') return SIGN.test(text) ? text : `+${text}`;

  const unsigned = text.replace(SIGN, '');
  return text.startsWith('-') ? unsigned : `-${unsigned}`;
}

/**
 * Resolves a numeric document value to its text: a numeric literal, `NaN`,
 * `Infinity`, or any of these under `-` / `+` prefixes.
 *
 * Example:
 *   `-9007199254740993` -> "-9007199254740993"
 *   `- -5`              -> "5"
 *   `+2.50`             -> "+2.50"
 */
export function tryResolveNumericText(
  node: types.Node
): StaticResult<NumericText> {
  const literal = tryResolveNumericLiteral(node);
  if (literal.success) return literal;

  if (is.identifier(node)) {
    return node.name === 'NaN' || node.name === 'Infinity'
      ? resolved({ text: node.name, bigint: false })
      : UNRESOLVED;
  }

  if (!is.unaryExpression(node)) return UNRESOLVED;
  const { operator } = node;
  if (operator !== '-' && operator !== '+') return UNRESOLVED;

  const operand = tryResolveNumericText(node.argument);
  if (!operand.success) return UNRESOLVED;
  // Unary plus on a bigint is a TypeError at runtime.
  if (operand.value.bigint && operator === '+') return UNRESOLVED;

  return resolved({
    text: applySign(operator, operand.value.text),
    bigint: operand.value.bigint
  });
}

/**
 * Resolves an ESTree node to document scalar text.
 *
 * Numbers keep their source spelling ({@link tryResolveNumericText}); strings,
 * booleans, `null` and static templates use their evaluated value.
 */
export function tryResolveScalarText(node: types.Node): StaticResult<string> {
  const numeric = tryResolveNumericText(node);
  if (numeric.success) return resolved(numeric.value.text);

  const resolution = tryResolveStaticValue(node);
  if (!resolution.success) return UNRESOLVED;

  const { value } = resolution;
  return resolved(value === null ? 'null' : String(value));
}

/**
 * Attempts to resolve an ESTree node to a static scalar.
 *
 * Resolution order:
 * 1. Atomic constants (literals, `NaN`, `Infinity`)
 * 2. Signed numbers
 * 3. String interpolation
 *
 * Anything else (identifiers, calls, member access, containers) is reported
 * as unresolved; containers are handled by the tree builder, everything else
 * is not static data.
 */
export function tryResolveStaticValue(
  node: types.Node
): StaticResult<StaticScalar> {
  let result: StaticResult<StaticScalar>;

  if ((result = tryResolveLiteral(node)).success) return result;
  if ((result = tryResolveIdentifier(node)).success) return result;
  if ((result = tryResolveSigned(node)).success) return result;
  if ((result = tryResolveTemplate(node)).success) return result;

  return UNRESOLVED;
}
