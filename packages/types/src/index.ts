// @argspec/types: stock type capabilities for @argspec/core

export {
  Any,
  Bool,
  Defined,
  Int,
  NonEmptyStr,
  Num,
  PositiveInt,
  PositiveOrZeroInt,
  Str,
} from './primitives.js';
export {
  arrayOf,
  enumOf,
  instanceOf,
  maybe,
  predicate,
  union,
  type EnumValue,
} from './combinators.js';
export { withNumericStringCoercion } from './coercion.js';
export {
  createAjv,
  schemaType,
  type AjvInstance,
  type SchemaTypeOptions,
} from './schema-type.js';
export { received } from './received.js';
