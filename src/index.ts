// Descriptors and combinators
export {
  allOf,
  Any,
  Bool,
  CombinationDescriptor,
  enumOf,
  Float,
  InstanceDescriptor,
  instanceOf,
  Integer,
  literal,
  not,
  Null,
  oneOf,
  refine,
  RefinementDescriptor,
  ScalarDescriptor,
  Str,
  TypeDescriptor,
  union,
  UnionDescriptor,
} from "./descriptor.js";
export type { Infer, ValidationResult } from "./descriptor.js";
// Constraint catalogue
export {
  AdditionalProperties,
  Constraint,
  constraint,
  DateTime,
  Default,
  Description,
  Email,
  Examples,
  ExclusiveMaximum,
  ExclusiveMinimum,
  Format,
  Hostname,
  Ipv4,
  Ipv6,
  Maximum,
  MaxItems,
  MaxLength,
  MaxProperties,
  Minimum,
  MinItems,
  MinLength,
  MinProperties,
  MultipleOf,
  Pattern,
  Required,
  Title,
  UniqueItems,
  Uri,
  Uuid,
} from "./constraints.js";
// Containers
export {
  Bunch,
  BunchDescriptor,
  Dict,
  DictContainer,
  DictDescriptor,
  Evented,
  isRecordHandle,
  RecordDescriptor,
} from "./record.js";
export type {
  Extended,
  InferShape,
  Parametrized,
  PropertyPolicy,
  RecordDefinition,
  RecordLayout,
  Shape,
} from "./record.js";
export {
  List,
  ListContainer,
  ListDescriptor,
  SequenceDescriptor,
  Tuple,
  TupleContainer,
  TupleDescriptor,
  Unique,
} from "./sequence.js";
export type { InferTuple, SequenceLayout } from "./sequence.js";
// Event links
export { dlink, link, observe } from "./link.js";
export type { LinkHandle, LinkTransform, ObserveHandle } from "./link.js";
// Config binding
export { bindConfig, loadConfig, readConfigFile } from "./config.js";
export type { ConfigOptions, ConfigReader, ConfigSource } from "./config.js";
// Schema documents and errors
export { STRING_FORMATS } from "./compile.js";
export type { StringFormat } from "./compile.js";
export { DefinitionError, formatPath, ValidationFailure } from "./errors.js";
export type { PathSegment, ValidationFailureDetails, ValidationIssue } from "./errors.js";
export { ChalkLogger, getLogger, NoOpLogger, setLogger } from "./logger.js";
export type { Logger } from "./logger.js";
export { mergeSchema, schemaDocumentSchema } from "./schema.js";
export type { FieldChange, FieldObserver, RecordHandle, SchemaDocument, SimpleType } from "./types.js";
export { RECORD_STORE } from "./types.js";
