/**
 * Construction engine: builds typed params instances from raw values.
 *
 * @packageDocumentation
 */

export { construct, validateParams } from './builder.js';
export type { ParamsValidationResult } from './builder.js';
export { AggregatedValidationError } from './errors.js';
export type {
  DepthLimitError,
  DuplicateKeyError,
  MissingFieldError,
  TypeMismatchError,
  UnionAlternativeFailure,
  UnknownFieldError,
  ValidationError,
  ValidationErrorCode,
} from './errors.js';
export { isInstanceOf, paramsEqual, schemaOf, toRawValue } from './instance.js';
export { formatPath } from './path.js';
export type { FieldPath, PathSegment } from './path.js';
export { ErrorReporter, previewValue, renderReport, runtimeType } from './reporter.js';
export type { MatchResult } from './reporter.js';
