/**
 * Declaration reader
 *
 * Walks the top level of a TypeScript module and reports its classes, enums,
 * type aliases and interfaces as plain declaration data.
 */

import type * as t from '@babel/types';
import { parse } from '../parser/index.js';
import type {
  Accessibility,
  ClassDeclaration,
  ConstructorParameterDecl,
  Diagnostic,
  EnumDeclaration,
  InterfaceDeclaration,
  MethodDecl,
  ParameterDecl,
  PropertyDecl,
  SourceLocation,
  TypeAliasDeclaration,
  TypeDeclaration,
  TypeRef,
} from '../types/index.js';
import { annotationsOf } from './jsdoc.js';
import { TypeConverter, UNKNOWN_TYPE, entityName, expressionName } from './type-converter.js';

export interface ReadOptions {
  /** Module specifier generated code imports these declarations from */
  module?: string;
  /** Source filename (for error messages) */
  filename?: string;
}

export interface ReadResult {
  declarations: TypeDeclaration[];
  diagnostics: Diagnostic[];
}

const VOID_TYPE: TypeRef = { kind: 'primitive', name: 'void' };
const UNDEFINED_TYPE: TypeRef = { kind: 'primitive', name: 'undefined' };

/** `name?: T` holds `T | undefined` */
function withUndefined(type: TypeRef): TypeRef {
  const members = type.kind === 'union' ? type.members : [type];
  if (members.some((member) => member.kind === 'primitive' && member.name === 'undefined')) return type;
  return { kind: 'union', members: [...members, UNDEFINED_TYPE] };
}

function locationOf(node: t.Node): SourceLocation | undefined {
  const start = node.loc?.start;
  return start ? { line: start.line, column: start.column } : undefined;
}

function keyName(key: t.Node, computed: boolean): string | undefined {
  if (computed) return undefined;
  if (key.type === 'Identifier') return key.name;
  if (key.type === 'StringLiteral') return key.value;
  return undefined;
}

function accessibilityOf(value: 'public' | 'private' | 'protected' | null | undefined): Accessibility {
  return value ?? 'public';
}

function typeParameterNames(
  declaration: t.TSTypeParameterDeclaration | t.TypeParameterDeclaration | t.Noop | null | undefined
): string[] {
  if (!declaration || declaration.type !== 'TSTypeParameterDeclaration') return [];
  return declaration.params.map((param) => param.name);
}

class DeclarationReader {
  private readonly types: TypeConverter;

  constructor(
    source: string,
    private readonly module: string
  ) {
    this.types = new TypeConverter(source);
  }

  // ==========================================================================
  // Members
  // ==========================================================================

  private parameter(param: t.Node): ParameterDecl | undefined {
    const target = param.type === 'AssignmentPattern' ? param.left : param;
    if (target.type === 'Identifier') {
      return { name: target.name, type: this.types.annotation(target.typeAnnotation) };
    }
    if (target.type === 'RestElement' && target.argument.type === 'Identifier') {
      return { name: target.argument.name, type: this.types.annotation(target.typeAnnotation) };
    }
    return undefined;
  }

  private parameters(params: readonly t.Node[]): ParameterDecl[] {
    return params.flatMap((param) => this.parameter(param) ?? []);
  }

  private constructorParameter(param: t.Node): ConstructorParameterDecl | undefined {
    const target = param.type === 'TSParameterProperty' ? param.parameter : param;
    const read = this.parameter(target);
    if (!read) return undefined;
    const optional = target.type === 'Identifier' && target.optional === true;
    const inner = optional ? { ...read, type: withUndefined(read.type) } : read;

    if (param.type === 'TSParameterProperty') {
      return {
        ...inner,
        isParameterProperty: true,
        isReadonly: param.readonly ?? false,
        accessibility: accessibilityOf(param.accessibility),
      };
    }
    return { ...inner, isParameterProperty: false, isReadonly: false, accessibility: 'public' };
  }

  private method(node: t.ClassMethod | t.TSDeclareMethod): MethodDecl | undefined {
    const name = keyName(node.key, node.computed ?? false);
    if (name === undefined || node.kind === 'constructor') return undefined;
    return {
      name,
      kind: node.kind ?? 'method',
      accessibility: accessibilityOf(node.accessibility),
      isStatic: node.static ?? false,
      isAbstract: node.abstract ?? false,
      parameters: this.parameters(node.params),
      returnType: this.types.annotation(node.returnType, node.kind === 'get' ? UNKNOWN_TYPE : VOID_TYPE),
      annotations: annotationsOf(node),
      location: locationOf(node),
    };
  }

  private property(node: t.ClassProperty): PropertyDecl | undefined {
    const name = keyName(node.key, node.computed ?? false);
    if (name === undefined) return undefined;
    return {
      name,
      type: this.types.annotation(node.typeAnnotation),
      accessibility: accessibilityOf(node.accessibility),
      isStatic: node.static ?? false,
      isReadonly: node.readonly ?? false,
      isOptional: node.optional ?? false,
    };
  }

  // ==========================================================================
  // Declarations
  // ==========================================================================

  private classDeclaration(node: t.ClassDeclaration, ...commentHolders: t.Node[]): ClassDeclaration | undefined {
    if (!node.id) return undefined;

    let constructorParameters: ConstructorParameterDecl[] | undefined;
    const properties: PropertyDecl[] = [];
    const methods: MethodDecl[] = [];

    for (const element of node.body.body) {
      switch (element.type) {
        case 'ClassMethod':
        case 'TSDeclareMethod':
          if (element.kind === 'constructor') {
            // With overloads, the last signature is the implementation
            const params: readonly t.Node[] = element.params;
            constructorParameters = params.flatMap((param) => this.constructorParameter(param) ?? []);
          } else {
            const method = this.method(element);
            if (method) methods.push(method);
          }
          break;
        case 'ClassProperty': {
          const property = this.property(element);
          if (property) properties.push(property);
          break;
        }
        case 'ClassPrivateProperty': {
          properties.push({
            name: `#${element.key.id.name}`,
            type: this.types.annotation(element.typeAnnotation),
            accessibility: 'private',
            isStatic: element.static ?? false,
            isReadonly: false,
            isOptional: false,
          });
          break;
        }
        default:
          break;
      }
    }

    const superName = node.superClass ? expressionName(node.superClass) : undefined;
    const superClass: TypeRef | undefined = superName
      ? { kind: 'reference', name: superName, typeArguments: this.types.typeArguments(node.superTypeParameters) }
      : undefined;

    const interfaces: TypeRef[] = (node.implements ?? []).flatMap((heritage): TypeRef[] =>
      heritage.type === 'TSExpressionWithTypeArguments'
        ? [
            {
              kind: 'reference',
              name: entityName(heritage.expression),
              typeArguments: this.types.typeArguments(heritage.typeParameters),
            },
          ]
        : []
    );

    return {
      declarationKind: 'class',
      name: node.id.name,
      module: this.module,
      typeParameters: typeParameterNames(node.typeParameters),
      isAbstract: node.abstract ?? false,
      superClass,
      interfaces,
      constructorParameters,
      properties,
      methods,
      annotations: annotationsOf(...commentHolders, node),
      location: locationOf(node),
    };
  }

  private enumDeclaration(node: t.TSEnumDeclaration, ...commentHolders: t.Node[]): EnumDeclaration {
    return {
      declarationKind: 'enum',
      name: node.id.name,
      module: this.module,
      members: node.members.map((member) => (member.id.type === 'Identifier' ? member.id.name : member.id.value)),
      annotations: annotationsOf(...commentHolders, node),
      location: locationOf(node),
    };
  }

  private typeAliasDeclaration(node: t.TSTypeAliasDeclaration, ...commentHolders: t.Node[]): TypeAliasDeclaration {
    return {
      declarationKind: 'typeAlias',
      name: node.id.name,
      module: this.module,
      typeParameters: typeParameterNames(node.typeParameters),
      aliased: this.types.convert(node.typeAnnotation),
      annotations: annotationsOf(...commentHolders, node),
      location: locationOf(node),
    };
  }

  private interfaceDeclaration(node: t.TSInterfaceDeclaration, ...commentHolders: t.Node[]): InterfaceDeclaration {
    const properties: PropertyDecl[] = [];
    const methods: MethodDecl[] = [];

    for (const element of node.body.body) {
      const name = element.type === 'TSPropertySignature' || element.type === 'TSMethodSignature'
        ? keyName(element.key, element.computed ?? false)
        : undefined;
      if (name === undefined) continue;

      if (element.type === 'TSPropertySignature') {
        properties.push({
          name,
          type: this.types.annotation(element.typeAnnotation),
          accessibility: 'public',
          isStatic: false,
          isReadonly: element.readonly ?? false,
          isOptional: element.optional ?? false,
        });
      } else if (element.type === 'TSMethodSignature') {
        methods.push({
          name,
          kind: element.kind,
          accessibility: 'public',
          isStatic: false,
          isAbstract: true,
          parameters: this.parameters(element.parameters),
          returnType: this.types.annotation(element.typeAnnotation, VOID_TYPE),
          annotations: annotationsOf(element),
          location: locationOf(element),
        });
      }
    }

    return {
      declarationKind: 'interface',
      name: node.id.name,
      module: this.module,
      typeParameters: typeParameterNames(node.typeParameters),
      extends: (node.extends ?? []).map((heritage): TypeRef => ({
        kind: 'reference',
        name: entityName(heritage.expression),
        typeArguments: this.types.typeArguments(heritage.typeParameters),
      })),
      properties,
      methods,
      annotations: annotationsOf(...commentHolders, node),
      location: locationOf(node),
    };
  }

  /**
   * Declaration introduced by one top-level statement, if any
   */
  statement(node: t.Node, holder?: t.Node): TypeDeclaration | undefined {
    const holders = holder ? [holder] : [];
    switch (node.type) {
      case 'ClassDeclaration':
        return this.classDeclaration(node, ...holders);
      case 'TSEnumDeclaration':
        return this.enumDeclaration(node, ...holders);
      case 'TSTypeAliasDeclaration':
        return this.typeAliasDeclaration(node, ...holders);
      case 'TSInterfaceDeclaration':
        return this.interfaceDeclaration(node, ...holders);
      case 'ExportNamedDeclaration':
        return node.declaration ? this.statement(node.declaration, node) : undefined;
      case 'ExportDefaultDeclaration':
        return node.declaration.type === 'ClassDeclaration' ? this.statement(node.declaration, node) : undefined;
      default:
        return undefined;
    }
  }
}

/**
 * Read the type declarations of one TypeScript module
 */
export function readDeclarations(source: string, options: ReadOptions = {}): ReadResult {
  const module = options.module ?? './model.js';
  const { ast, errors } = parse(source, { filename: options.filename });
  const reader = new DeclarationReader(source, module);

  const diagnostics: Diagnostic[] = errors.map((error): Diagnostic => ({
    severity: 'error',
    category: 'parse',
    message: error.message,
    typeName: options.filename ?? module,
    line: error.line,
    column: error.column,
  }));

  const declarations = ast.program.body.flatMap((statement) => reader.statement(statement) ?? []);
  return { declarations, diagnostics };
}
