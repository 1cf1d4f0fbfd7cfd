/**
 * Error types for type wiring assembly.
 *
 * Every failure here is a wiring mistake caught while the bindings are being
 * assembled, before any schema built from them is executed.
 */

/**
 * Kind of binding that was assigned twice.
 */
export type BindingKind = 'field' | 'default_resolver';

/**
 * Base error class for wiring errors.
 */
export class WiringError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'WiringError';
  }
}

/**
 * Error thrown when a required argument is absent or empty.
 */
export class InvalidArgumentError extends WiringError {
  readonly argument: string;

  constructor(argument: string, message: string) {
    super(message);
    this.name = 'InvalidArgumentError';
    this.argument = argument;
  }
}

/**
 * Error thrown in strict mode when a binding is defined twice for one type.
 */
export class DuplicateBindingError extends WiringError {
  readonly binding: BindingKind;
  readonly typeName: string | null;
  readonly fieldName: string | null;

  constructor(
    binding: BindingKind,
    typeName: string | null,
    fieldName: string | null,
    message: string
  ) {
    super(message);
    this.name = 'DuplicateBindingError';
    this.binding = binding;
    this.typeName = typeName;
    this.fieldName = fieldName;
  }

  static forField(typeName: string | null, fieldName: string): DuplicateBindingError {
    return new DuplicateBindingError(
      'field',
      typeName,
      fieldName,
      `The field '${fieldName}' already has a resolver defined on type ${describeType(typeName)}`
    );
  }

  static forDefaultResolver(typeName: string | null): DuplicateBindingError {
    return new DuplicateBindingError(
      'default_resolver',
      typeName,
      null,
      `The type ${describeType(typeName)} already has a default resolver defined`
    );
  }
}

function describeType(typeName: string | null): string {
  return typeName === null ? '(unnamed)' : `'${typeName}'`;
}
