/**
 * Core types - declaration model, shapes, hints, plans
 */

export type {
  SourceLocation,
  PrimitiveName,
  PrimitiveRef,
  NamedRef,
  ArrayRef,
  UnionRef,
  LiteralRef,
  ThisRef,
  OtherRef,
  TypeRef,
  TypeRefKind,
  Annotation,
  Accessibility,
  ParameterDecl,
  MethodDecl,
  PropertyDecl,
  ConstructorParameterDecl,
  ClassDeclaration,
  EnumDeclaration,
  TypeAliasDeclaration,
  InterfaceDeclaration,
  TypeDeclaration,
  DeclarationKind,
  TypeRegistry,
} from './declarations.js';

export type {
  ContainerKind,
  ContainerType,
  FieldAccess,
  FieldDescriptor,
  CopyOperation,
  ShapeKind,
  ProductShape,
  SumShape,
  EnumeratedShape,
  CopyMutableShape,
  UnsupportedShape,
  TypeShape,
} from './shape.js';

export type {
  CopyStrategyInfo,
  CopyStrategyKind,
  PrismHintInfo,
  PrismHintKind,
  TraversalHintInfo,
  TraversalHintKind,
} from './hints.js';
export { CopyStrategies, PrismHints, TraversalHints } from './hints.js';

export type { DiagnosticCategory, Diagnostic } from './diagnostics.js';
export { OpticsGenerationError } from './diagnostics.js';

export type {
  OpticKind,
  MemberRole,
  ParamSpec,
  MethodDefinition,
  NavigatorClass,
  TypeImport,
  GeneratedArtifact,
} from './plan.js';
export { qualifiedName } from './plan.js';

export type { GenerationOptions, ResolvedOptions } from './options.js';
export { MAX_NAVIGATOR_DEPTH, DEFAULT_GENERATION_OPTIONS, clampDepth, resolveOptions } from './options.js';
