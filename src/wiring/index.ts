/**
 * Per-type runtime wiring.
 *
 * - `newTypeWiring`: Entry point, returns a builder or a finished wiring
 * - `TypeWiringBuilder`: Accumulates bindings for one type
 * - `TypeWiring`: Immutable result consumed by schema construction
 * - `setDefaultStrictMode` / `getDefaultStrictMode`: Process-wide strict mode
 */

export {
  type EnumValueProvider,
  type FieldArgs,
  type FieldResolver,
  staticEnumValues,
  type TypeDiscriminator,
} from './bindings.js';
export {
  type BindingKind,
  DuplicateBindingError,
  InvalidArgumentError,
  WiringError,
} from './errors.js';
export {
  getDefaultStrictMode,
  INITIAL_STRICT_MODE,
  setDefaultStrictMode,
  StrictModeSetting,
} from './strict-mode.js';
export {
  type FieldResolverMap,
  newTypeWiring,
  TypeWiring,
  TypeWiringBuilder,
  type TypeWiringBuilderOptions,
  type TypeWiringConfigurer,
  type TypeWiringState,
} from './type-wiring.js';
