/**
 * Parser Extension: Declarations
 * Variables, constants, functions, structs, enums, traits, impls and imports
 */

import { Parser } from './parser.js';
import type {
  ConstDeclStmt,
  EnumDeclStmt,
  EnumVariant,
  Expr,
  FunctionDeclStmt,
  ImplBlockStmt,
  ImportDeclStmt,
  Param,
  StructDeclStmt,
  StructField,
  TraitDeclStmt,
  TraitMethod,
  TypeNode,
  VarDeclStmt,
} from '../ast-nodes.js';
import type { SourceLocation } from '../source-location.js';
import { TOKEN_TYPES, describeToken } from '../token-types.js';
import {
  advance,
  checkKeyword,
  checkOp,
  checkPunct,
  expectIdent,
  expectKeyword,
  expectOp,
  expectPunct,
  isAtEnd,
  matchPunct,
  parseError,
  peek,
  skipSemicolon,
  spanFrom,
} from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseVarDecl(start: SourceLocation, mutable: boolean): VarDeclStmt;
    parseConstDecl(): ConstDeclStmt;
    parseFunctionDecl(
      start: SourceLocation,
      isAsync: boolean,
      isExported: boolean
    ): FunctionDeclStmt;
    parseTypeParams(): string[];
    parseParams(implicitSelfType: (name: string) => TypeNode): Param[];
    parseStructDecl(): StructDeclStmt;
    parseEnumDecl(): EnumDeclStmt;
    parseTraitDecl(): TraitDeclStmt;
    parseTraitMethod(): TraitMethod;
    parseImplBlock(): ImplBlockStmt;
    parseImportDecl(): ImportDeclStmt;
  }
}

// ============================================================
// VARIABLES AND CONSTANTS
// ============================================================

/** `let x: T = v;`, `mut let x = v;` or `let mut x = v;` */
Parser.prototype.parseVarDecl = function (
  this: Parser,
  start: SourceLocation,
  mutable: boolean
): VarDeclStmt {
  expectKeyword(this.state, 'let');

  let isMutable = mutable;
  if (!isMutable && checkKeyword(this.state, 'mut')) {
    advance(this.state);
    isMutable = true;
  }

  const name = expectIdent(this.state);
  const varType = matchPunct(this.state, ':') ? this.parseType() : null;

  let value: Expr | null = null;
  if (checkOp(this.state, '=')) {
    advance(this.state);
    value = this.parseExpression();
  }

  skipSemicolon(this.state);
  return {
    type: 'VarDecl',
    name,
    varType,
    mutable: isMutable,
    value,
    span: spanFrom(this.state, start),
  };
};

Parser.prototype.parseConstDecl = function (this: Parser): ConstDeclStmt {
  const start = this.state.cursor.location();
  expectKeyword(this.state, 'const');

  const name = expectIdent(this.state);
  const constType = matchPunct(this.state, ':') ? this.parseType() : null;

  // Constants always have a value
  expectOp(this.state, '=');
  const value = this.parseExpression();

  skipSemicolon(this.state);
  return {
    type: 'ConstDecl',
    name,
    constType,
    value,
    span: spanFrom(this.state, start),
  };
};

// ============================================================
// FUNCTIONS
// ============================================================

Parser.prototype.parseFunctionDecl = function (
  this: Parser,
  start: SourceLocation,
  isAsync: boolean,
  isExported: boolean
): FunctionDeclStmt {
  expectKeyword(this.state, 'fn');
  const name = expectIdent(this.state, 'function name');
  const typeParams = this.parseTypeParams();

  expectPunct(this.state, '(');
  // `self` may omit its type
  const params = this.parseParams(() => ({ type: 'NamedType', name: 'Self' }));
  expectPunct(this.state, ')');

  let returnType: TypeNode | null = null;
  if (checkOp(this.state, '->')) {
    advance(this.state);
    returnType = this.parseType();
  }

  const body = this.parseBlock();

  return {
    type: 'FunctionDecl',
    name,
    typeParams,
    params,
    returnType,
    body,
    isAsync,
    isExported,
    span: spanFrom(this.state, start),
  };
};

/** Optional `<T, U>` after a function name */
Parser.prototype.parseTypeParams = function (this: Parser): string[] {
  const typeParams: string[] = [];
  if (!checkOp(this.state, '<')) return typeParams;
  advance(this.state);

  for (;;) {
    typeParams.push(expectIdent(this.state, 'type parameter name'));
    if (matchPunct(this.state, ',')) continue;
    expectOp(this.state, '>');
    return typeParams;
  }
};

/**
 * Parameter list contents up to (not including) `)`. Commas between
 * parameters are optional. `implicitSelfType` gives the type of a `self`
 * parameter written without one.
 */
Parser.prototype.parseParams = function (
  this: Parser,
  implicitSelfType: (name: string) => TypeNode
): Param[] {
  const params: Param[] = [];

  while (!isAtEnd(this.state) && !checkPunct(this.state, ')')) {
    const name = expectIdent(this.state, 'parameter name');

    let paramType: TypeNode;
    if (name === 'self' && !checkPunct(this.state, ':')) {
      paramType = implicitSelfType(name);
    } else {
      expectPunct(this.state, ':');
      paramType = this.parseType();
    }

    params.push({ name, paramType });
    matchPunct(this.state, ',');
  }

  return params;
};

// ============================================================
// STRUCTS AND ENUMS
// ============================================================

/** `def Point { x: num, y: num }` */
Parser.prototype.parseStructDecl = function (this: Parser): StructDeclStmt {
  const start = this.state.cursor.location();
  expectKeyword(this.state, 'def');
  const name = expectIdent(this.state, 'struct name');
  expectPunct(this.state, '{');

  const fields: StructField[] = [];
  while (!isAtEnd(this.state) && !checkPunct(this.state, '}')) {
    const fieldName = expectIdent(this.state, 'field name');
    expectPunct(this.state, ':');
    fields.push({ name: fieldName, fieldType: this.parseType() });
    matchPunct(this.state, ',');
  }

  expectPunct(this.state, '}');
  return {
    type: 'StructDecl',
    name,
    fields,
    span: spanFrom(this.state, start),
  };
};

/** `enum Shape { Circle(num), Square(num, num), Empty }` */
Parser.prototype.parseEnumDecl = function (this: Parser): EnumDeclStmt {
  const start = this.state.cursor.location();
  expectKeyword(this.state, 'enum');
  const name = expectIdent(this.state, 'enum name');
  expectPunct(this.state, '{');

  const variants: EnumVariant[] = [];
  while (!isAtEnd(this.state) && !checkPunct(this.state, '}')) {
    const variantName = expectIdent(this.state, 'variant name');

    let fields: TypeNode[] | null = null;
    if (matchPunct(this.state, '(')) {
      fields = [];
      while (!isAtEnd(this.state) && !checkPunct(this.state, ')')) {
        fields.push(this.parseType());
        matchPunct(this.state, ',');
      }
      expectPunct(this.state, ')');
    }

    variants.push({ name: variantName, fields });
    matchPunct(this.state, ',');
  }

  expectPunct(this.state, '}');
  return {
    type: 'EnumDecl',
    name,
    variants,
    span: spanFrom(this.state, start),
  };
};

// ============================================================
// TRAITS AND IMPLS
// ============================================================

Parser.prototype.parseTraitDecl = function (this: Parser): TraitDeclStmt {
  const start = this.state.cursor.location();
  expectKeyword(this.state, 'trait');
  const name = expectIdent(this.state, 'trait name');
  expectPunct(this.state, '{');

  const methods: TraitMethod[] = [];
  while (!isAtEnd(this.state) && !checkPunct(this.state, '}')) {
    methods.push(this.parseTraitMethod());
  }

  expectPunct(this.state, '}');
  return {
    type: 'TraitDecl',
    name,
    methods,
    span: spanFrom(this.state, start),
  };
};

/**
 * `fn name(params) -> Type;` is a signature, `fn name(params) -> Type { ... }`
 * a default implementation. The return type is required.
 */
Parser.prototype.parseTraitMethod = function (this: Parser): TraitMethod {
  expectKeyword(this.state, 'fn');
  const name = expectIdent(this.state, 'method name');

  expectPunct(this.state, '(');
  // Untyped parameters are typed by their own name (`self` -> `self`)
  const params = this.parseParams((paramName) => ({
    type: 'NamedType',
    name: paramName,
  }));
  expectPunct(this.state, ')');

  expectOp(this.state, '->');
  const returnType = this.parseType();

  if (matchPunct(this.state, ';')) {
    return { type: 'Signature', name, params, returnType };
  }
  if (checkPunct(this.state, '{')) {
    const body = this.parseBlock();
    return { type: 'Default', name, params, returnType, body };
  }

  const token = peek(this.state);
  throw parseError(
    this.state,
    'LOFT-P003',
    {
      expected: "';' or '{' after trait method signature",
      actual: describeToken(token),
    },
    token
  );
};

/** `impl Trait for Type { fn ... }` or `impl Type { fn ... }` */
Parser.prototype.parseImplBlock = function (this: Parser): ImplBlockStmt {
  const start = this.state.cursor.location();
  expectKeyword(this.state, 'impl');
  const firstName = expectIdent(this.state, 'type or trait name');

  let typeName = firstName;
  let traitName: string | null = null;
  if (checkKeyword(this.state, 'for')) {
    advance(this.state);
    traitName = firstName;
    typeName = expectIdent(this.state, 'type name');
  }

  expectPunct(this.state, '{');
  const methods: FunctionDeclStmt[] = [];
  while (!isAtEnd(this.state) && !checkPunct(this.state, '}')) {
    methods.push(
      this.parseFunctionDecl(this.state.cursor.location(), false, false)
    );
  }
  expectPunct(this.state, '}');

  return {
    type: 'ImplBlock',
    typeName,
    traitName,
    methods,
    span: spanFrom(this.state, start),
  };
};

// ============================================================
// IMPORTS
// ============================================================

/** `learn "a::b::c";` splits the path string on `::` */
Parser.prototype.parseImportDecl = function (this: Parser): ImportDeclStmt {
  const start = this.state.cursor.location();
  expectKeyword(this.state, 'learn');

  const token = peek(this.state);
  if (token?.type !== TOKEN_TYPES.STRING) {
    throw parseError(
      this.state,
      'LOFT-P003',
      {
        expected: "string literal after 'learn'",
        actual: describeToken(token),
      },
      token
    );
  }
  if (token.value === '') {
    throw parseError(this.state, 'LOFT-P005', {}, token);
  }
  advance(this.state);

  skipSemicolon(this.state);
  return {
    type: 'ImportDecl',
    path: token.value.split('::'),
    span: spanFrom(this.state, start),
  };
};
