/**
 * Type wiring: the bindings assembled for one schema type.
 *
 * A TypeWiringBuilder collects field resolvers, a default resolver, a type
 * discriminator and enum values for a single type name, then build() hands out
 * an immutable TypeWiring for the schema-construction engine.
 *
 * @example Chained
 * ```typescript
 * const pet = newTypeWiring<Pet>('Pet')
 *   .withFieldResolver('name', (pet) => pet.name)
 *   .withDefaultResolver(propertyResolver)
 *   .build();
 * ```
 *
 * @example Single transformation step
 * ```typescript
 * const node = newTypeWiring('Node', (builder) =>
 *   builder.withTypeDiscriminator((value) => discriminate(value))
 * );
 * ```
 */

import { type ComponentLogger, createLogger } from '../logging/index.js';
import type { EnumValueProvider, FieldResolver, TypeDiscriminator } from './bindings.js';
import { DuplicateBindingError, InvalidArgumentError } from './errors.js';
import { StrictModeSetting } from './strict-mode.js';

const defaultLog = createLogger({ component: 'type_wiring' });

/**
 * Field resolvers accepted in bulk: a Map or a plain record keyed by field name.
 */
export type FieldResolverMap<TSource = unknown, TContext = unknown> =
  | Map<string, FieldResolver<TSource, TContext>>
  | Readonly<Record<string, FieldResolver<TSource, TContext>>>;

/**
 * Options for creating a builder.
 */
export interface TypeWiringBuilderOptions {
  /** Explicit strict mode. Wins over `setting`. */
  strictMode?: boolean;

  /** Setting to seed strict mode from (default: the process-wide setting). */
  setting?: StrictModeSetting;

  /** Logger for diagnostics (default: the package logger, component "type_wiring"). */
  logger?: ComponentLogger;
}

/**
 * Bindings captured by build().
 */
export interface TypeWiringState<TSource = unknown, TContext = unknown> {
  typeName: string;
  fieldResolvers: ReadonlyMap<string, FieldResolver<TSource, TContext>>;
  defaultResolver: FieldResolver<TSource, TContext> | null;
  typeDiscriminator: TypeDiscriminator<TSource, TContext> | null;
  enumValues: EnumValueProvider | null;
}

/**
 * Immutable bindings for one schema type.
 *
 * Created by TypeWiringBuilder.build(). The field resolvers are held in a
 * private copy; `fieldResolvers` hands out a new Map on every read, so neither
 * the builder nor a reader can change a finished wiring.
 */
export class TypeWiring<TSource = unknown, TContext = unknown> {
  readonly typeName: string;
  private readonly _fieldResolvers: Map<string, FieldResolver<TSource, TContext>>;
  readonly defaultResolver: FieldResolver<TSource, TContext> | null;
  readonly typeDiscriminator: TypeDiscriminator<TSource, TContext> | null;
  readonly enumValues: EnumValueProvider | null;

  /**
   * Prefer TypeWiringBuilder.build().
   *
   * @throws InvalidArgumentError if the type name is empty
   */
  constructor(state: TypeWiringState<TSource, TContext>) {
    if (!state.typeName || typeof state.typeName !== 'string') {
      throw new InvalidArgumentError('typeName', 'Type name must be a non-empty string');
    }
    this.typeName = state.typeName;
    this._fieldResolvers = new Map(state.fieldResolvers);
    this.defaultResolver = state.defaultResolver;
    this.typeDiscriminator = state.typeDiscriminator;
    this.enumValues = state.enumValues;
    Object.freeze(this);
  }

  /**
   * Field resolvers in binding order, as a fresh copy.
   */
  get fieldResolvers(): ReadonlyMap<string, FieldResolver<TSource, TContext>> {
    return new Map(this._fieldResolvers);
  }

  /**
   * Field names with an explicit resolver, in binding order.
   */
  fieldNames(): string[] {
    return Array.from(this._fieldResolvers.keys());
  }

  hasFieldResolver(fieldName: string): boolean {
    return this._fieldResolvers.has(fieldName);
  }

  /**
   * Look up the resolver that applies to a field.
   *
   * @returns The field's own resolver, else the default resolver, else null
   */
  resolverFor(fieldName: string): FieldResolver<TSource, TContext> | null {
    return this._fieldResolvers.get(fieldName) ?? this.defaultResolver;
  }

  /**
   * Get debug information about the wiring.
   *
   * @returns Object describing which bindings are present
   */
  debugInfo(): Record<string, unknown> {
    return {
      typeName: this.typeName,
      fieldCount: this._fieldResolvers.size,
      fields: this.fieldNames(),
      hasDefaultResolver: this.defaultResolver !== null,
      hasTypeDiscriminator: this.typeDiscriminator !== null,
      hasEnumValues: this.enumValues !== null,
    };
  }
}

function isResolverMap<TSource, TContext>(
  resolvers: FieldResolverMap<TSource, TContext>
): resolvers is Map<string, FieldResolver<TSource, TContext>> {
  return resolvers instanceof Map;
}

function requireFieldName(fieldName: string): void {
  if (!fieldName || typeof fieldName !== 'string') {
    throw new InvalidArgumentError('fieldName', 'Field name must be a non-empty string');
  }
}

function requirePresent(argument: string, value: unknown, message: string): void {
  if (value == null) {
    throw new InvalidArgumentError(argument, message);
  }
}

/**
 * Accumulates the bindings for one schema type.
 *
 * Each method validates its arguments immediately and returns the builder.
 * In strict mode, binding a field or the default resolver a second time throws
 * DuplicateBindingError and leaves the builder unchanged. In lenient mode the
 * later binding replaces the earlier one.
 *
 * A builder is meant for a single writer. build() may be called more than
 * once; every call returns a fresh snapshot of the current state.
 */
export class TypeWiringBuilder<TSource = unknown, TContext = unknown> {
  private _typeName: string | null = null;
  private readonly fieldResolvers: Map<string, FieldResolver<TSource, TContext>> = new Map();
  private defaultResolver: FieldResolver<TSource, TContext> | null = null;
  private typeDiscriminator: TypeDiscriminator<TSource, TContext> | null = null;
  private enumValues: EnumValueProvider | null = null;
  private strictMode: boolean;
  private readonly log: ComponentLogger;

  /**
   * Create a builder with no type name.
   *
   * Strict mode is read here, once, from `options.strictMode` or the setting.
   */
  constructor(options: TypeWiringBuilderOptions = {}) {
    this.strictMode =
      options.strictMode ?? (options.setting ?? StrictModeSetting.instance()).get();
    this.log = options.logger ?? defaultLog;
  }

  /**
   * The type name set so far, or null.
   */
  get typeName(): string | null {
    return this._typeName;
  }

  isStrict(): boolean {
    return this.strictMode;
  }

  /**
   * Set the name of the type being wired. This MUST be set before build().
   *
   * @throws InvalidArgumentError if name is empty
   */
  withTypeName(name: string): this {
    if (!name || typeof name !== 'string') {
      throw new InvalidArgumentError('typeName', 'Type name must be a non-empty string');
    }
    this._typeName = name;
    return this;
  }

  /**
   * Override strict mode for this builder only.
   */
  withStrictMode(strict: boolean): this {
    if (typeof strict !== 'boolean') {
      throw new InvalidArgumentError('strict', 'Strict mode must be a boolean');
    }
    this.strictMode = strict;
    return this;
  }

  /**
   * Bind a resolver to a field.
   *
   * @throws InvalidArgumentError if the field name or resolver is missing
   * @throws DuplicateBindingError in strict mode if the field is already bound
   */
  withFieldResolver(fieldName: string, resolver: FieldResolver<TSource, TContext>): this {
    requireFieldName(fieldName);
    requirePresent('resolver', resolver, `A resolver is required for field '${fieldName}'`);
    this.assertFieldUnbound(fieldName);
    this.putFieldResolver(fieldName, resolver);
    return this;
  }

  /**
   * Bind several field resolvers at once.
   *
   * The whole batch is checked before anything is bound: if one entry is
   * invalid or (in strict mode) already bound, nothing from the batch is kept.
   *
   * @throws InvalidArgumentError if the map or any entry is missing
   * @throws DuplicateBindingError in strict mode naming the first field already bound
   */
  withFieldResolvers(resolvers: FieldResolverMap<TSource, TContext>): this {
    requirePresent('resolvers', resolvers, 'A field resolver map is required');

    const entries: Array<[string, FieldResolver<TSource, TContext>]> = isResolverMap(resolvers)
      ? Array.from(resolvers.entries())
      : Object.entries(resolvers);

    for (const [fieldName, resolver] of entries) {
      requireFieldName(fieldName);
      requirePresent('resolver', resolver, `A resolver is required for field '${fieldName}'`);
      this.assertFieldUnbound(fieldName);
    }

    for (const [fieldName, resolver] of entries) {
      this.putFieldResolver(fieldName, resolver);
    }
    return this;
  }

  /**
   * Set the resolver used for every field without one of its own.
   *
   * @throws InvalidArgumentError if resolver is missing
   * @throws DuplicateBindingError in strict mode if a default resolver is already set
   */
  withDefaultResolver(resolver: FieldResolver<TSource, TContext>): this {
    requirePresent('resolver', resolver, 'A default resolver is required');
    if (this.defaultResolver !== null) {
      if (this.strictMode) {
        throw DuplicateBindingError.forDefaultResolver(this._typeName);
      }
      this.log.debug('Replacing default resolver', { type_name: this._typeName });
    }
    this.defaultResolver = resolver;
    return this;
  }

  /**
   * Set the discriminator for an interface or union type.
   *
   * @throws InvalidArgumentError if discriminator is missing
   */
  withTypeDiscriminator(discriminator: TypeDiscriminator<TSource, TContext>): this {
    requirePresent('discriminator', discriminator, 'A type discriminator is required');
    this.typeDiscriminator = discriminator;
    return this;
  }

  /**
   * Set the enum value provider for an enum type.
   *
   * @throws InvalidArgumentError if provider is missing
   */
  withEnumValueMapping(provider: EnumValueProvider): this {
    requirePresent('provider', provider, 'An enum value provider is required');
    this.enumValues = provider;
    return this;
  }

  /**
   * Snapshot the current bindings.
   *
   * @throws InvalidArgumentError if no type name was set
   */
  build(): TypeWiring<TSource, TContext> {
    if (this._typeName === null) {
      throw new InvalidArgumentError('typeName', 'A type name must be set before build()');
    }

    const wiring = new TypeWiring<TSource, TContext>({
      typeName: this._typeName,
      fieldResolvers: this.fieldResolvers,
      defaultResolver: this.defaultResolver,
      typeDiscriminator: this.typeDiscriminator,
      enumValues: this.enumValues,
    });
    this.log.debug('Built type wiring', {
      type_name: wiring.typeName,
      field_count: this.fieldResolvers.size,
      strict: this.strictMode,
    });
    return wiring;
  }

  private assertFieldUnbound(fieldName: string): void {
    if (this.strictMode && this.fieldResolvers.has(fieldName)) {
      throw DuplicateBindingError.forField(this._typeName, fieldName);
    }
  }

  private putFieldResolver(fieldName: string, resolver: FieldResolver<TSource, TContext>): void {
    if (this.fieldResolvers.has(fieldName)) {
      this.log.debug('Replacing field resolver', {
        type_name: this._typeName,
        field_name: fieldName,
      });
    }
    this.fieldResolvers.set(fieldName, resolver);
  }
}

/**
 * Transformation step applied by the single-call form of newTypeWiring().
 */
export type TypeWiringConfigurer<TSource = unknown, TContext = unknown> = (
  builder: TypeWiringBuilder<TSource, TContext>
) => TypeWiringBuilder<TSource, TContext>;

/**
 * Create a builder for a type, seeded from the process-wide strict mode.
 *
 * @throws InvalidArgumentError if typeName is empty
 */
export function newTypeWiring<TSource = unknown, TContext = unknown>(
  typeName: string
): TypeWiringBuilder<TSource, TContext>;
/**
 * Create, configure and build a type wiring in one call.
 *
 * @throws InvalidArgumentError if typeName is empty
 */
export function newTypeWiring<TSource = unknown, TContext = unknown>(
  typeName: string,
  configure: TypeWiringConfigurer<TSource, TContext>
): TypeWiring<TSource, TContext>;
export function newTypeWiring<TSource = unknown, TContext = unknown>(
  typeName: string,
  configure?: TypeWiringConfigurer<TSource, TContext>
): TypeWiringBuilder<TSource, TContext> | TypeWiring<TSource, TContext> {
  const builder = new TypeWiringBuilder<TSource, TContext>().withTypeName(typeName);
  if (configure === undefined) {
    return builder;
  }
  return configure(builder).build();
}
