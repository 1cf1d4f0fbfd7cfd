/**
 * Binding capabilities stored by a type wiring.
 *
 * These are opaque handles owned by the execution engine. Nothing in this
 * package inspects or invokes them.
 */

/**
 * Arguments passed to a field resolver.
 */
export type FieldArgs = Record<string, unknown>;

/**
 * Produces the value of one field at execution time.
 *
 * `info` is whatever resolution metadata the execution engine hands over.
 */
export type FieldResolver<TSource = unknown, TContext = unknown> = (
  source: TSource,
  args: FieldArgs,
  context: TContext,
  info: unknown
) => unknown;

/**
 * Names the concrete object type of a value returned for an interface or
 * union type.
 */
export type TypeDiscriminator<TSource = unknown, TContext = unknown> = (
  value: TSource,
  context: TContext,
  info: unknown
) => string | null | undefined | Promise<string | null | undefined>;

/**
 * Maps enum literals from the schema to internal values.
 */
export interface EnumValueProvider {
  getValue(name: string): unknown;
}

/**
 * Create an enum value provider backed by a fixed record.
 *
 * Literals missing from the record map to `null`.
 *
 * @example
 * ```typescript
 * const colors = staticEnumValues({ RED: '#f00', GREEN: '#0f0' });
 * colors.getValue('RED'); // '#f00'
 * colors.getValue('BLUE'); // null
 * ```
 */
export function staticEnumValues(values: Readonly<Record<string, unknown>>): EnumValueProvider {
  const entries = new Map<string, unknown>(Object.entries(values));
  return {
    getValue(name: string): unknown {
      return entries.has(name) ? entries.get(name) : null;
    },
  };
}
