import type { Decimal } from 'decimal.js';
import type { SourceSpan } from './source-location.js';

interface BaseNode {
  readonly span: SourceSpan;
}

// ============================================================
// TYPES
// ============================================================

/** `num`, `str`, `Point` */
export interface NamedType {
  readonly type: 'NamedType';
  readonly name: string;
}

/** `Vec<num>`, `Map<str, Vec<num>>` */
export interface GenericType {
  readonly type: 'GenericType';
  readonly base: string;
  readonly typeArgs: TypeNode[];
}

/**
 * Function type. Never produced by the type parser; built directly by
 * tools that need to describe callables.
 */
export interface FunctionType {
  readonly type: 'FunctionType';
  readonly params: TypeNode[];
  readonly returnType: TypeNode;
}

export type TypeNode = NamedType | GenericType | FunctionType;

// ============================================================
// EXPRESSIONS
// ============================================================

export interface NumberExpr extends BaseNode {
  readonly type: 'Number';
  readonly value: Decimal;
}

export interface StringExpr extends BaseNode {
  readonly type: 'String';
  readonly value: string;
}

export interface BooleanExpr extends BaseNode {
  readonly type: 'Boolean';
  readonly value: boolean;
}

export interface IdentExpr extends BaseNode {
  readonly type: 'Ident';
  readonly name: string;
}

export interface BinOpExpr extends BaseNode {
  readonly type: 'BinOp';
  readonly op: string;
  readonly left: Expr;
  readonly right: Expr;
}

/** Prefix `-x` and `!x` */
export interface UnaryOpExpr extends BaseNode {
  readonly type: 'UnaryOp';
  readonly op: string;
  readonly operand: Expr;
}

export interface CallExpr extends BaseNode {
  readonly type: 'Call';
  readonly func: Expr;
  readonly args: Expr[];
}

export interface FieldAccessExpr extends BaseNode {
  readonly type: 'FieldAccess';
  readonly object: Expr;
  readonly field: string;
}

export interface IndexExpr extends BaseNode {
  readonly type: 'Index';
  readonly array: Expr;
  readonly index: Expr;
}

export interface ArrayLiteralExpr extends BaseNode {
  readonly type: 'ArrayLiteral';
  readonly elements: Expr[];
}

export interface StructFieldInit {
  readonly name: string;
  readonly value: Expr;
}

/** `Point { x: 1, y: 2 }`; the name is always a bare identifier */
export interface StructLiteralExpr extends BaseNode {
  readonly type: 'StructLiteral';
  readonly name: string;
  readonly fields: StructFieldInit[];
}

export interface LambdaParam {
  readonly name: string;
  readonly paramType: TypeNode | null;
}

/**
 * Lambda: `v => body` or `(a: num, b) => body`.
 * Body is a Block expression or any other expression.
 */
export interface LambdaExpr extends BaseNode {
  readonly type: 'Lambda';
  readonly params: LambdaParam[];
  readonly returnType: TypeNode | null;
  readonly body: Expr;
}

export interface BlockExpr extends BaseNode {
  readonly type: 'Block';
  readonly statements: Stmt[];
}

export interface AwaitExpr extends BaseNode {
  readonly type: 'Await';
  readonly expression: Expr;
}

/** Eagerly started async computation */
export interface AsyncExpr extends BaseNode {
  readonly type: 'Async';
  readonly expression: Expr;
}

/** Deferred async computation */
export interface LazyExpr extends BaseNode {
  readonly type: 'Lazy';
  readonly expression: Expr;
}

export interface TemplateText {
  readonly type: 'Text';
  readonly value: string;
}

export interface TemplateExpression {
  readonly type: 'Expression';
  readonly expression: Expr;
}

export type TemplatePart = TemplateText | TemplateExpression;

export interface TemplateLiteralExpr extends BaseNode {
  readonly type: 'TemplateLiteral';
  readonly parts: TemplatePart[];
}

export interface MatchExprArm {
  readonly pattern: Expr;
  readonly body: Expr;
}

export interface MatchExpr extends BaseNode {
  readonly type: 'Match';
  readonly expression: Expr;
  readonly arms: MatchExprArm[];
}

/** Postfix `?` error propagation */
export interface TryExpr extends BaseNode {
  readonly type: 'Try';
  readonly expression: Expr;
}

export type Expr =
  | NumberExpr
  | StringExpr
  | BooleanExpr
  | IdentExpr
  | BinOpExpr
  | UnaryOpExpr
  | CallExpr
  | FieldAccessExpr
  | IndexExpr
  | ArrayLiteralExpr
  | StructLiteralExpr
  | LambdaExpr
  | BlockExpr
  | AwaitExpr
  | AsyncExpr
  | LazyExpr
  | TemplateLiteralExpr
  | MatchExpr
  | TryExpr;

// ============================================================
// DECLARATIONS
// ============================================================

/** `learn "std::io";` */
export interface ImportDeclStmt extends BaseNode {
  readonly type: 'ImportDecl';
  readonly path: string[];
}

export interface VarDeclStmt extends BaseNode {
  readonly type: 'VarDecl';
  readonly name: string;
  readonly varType: TypeNode | null;
  readonly mutable: boolean;
  readonly value: Expr | null;
}

export interface ConstDeclStmt extends BaseNode {
  readonly type: 'ConstDecl';
  readonly name: string;
  readonly constType: TypeNode | null;
  readonly value: Expr;
}

export interface Param {
  readonly name: string;
  readonly paramType: TypeNode;
}

export interface FunctionDeclStmt extends BaseNode {
  readonly type: 'FunctionDecl';
  readonly name: string;
  readonly typeParams: string[];
  readonly params: Param[];
  readonly returnType: TypeNode | null;
  readonly body: BlockStmt;
  readonly isAsync: boolean;
  /** Declared with `teach` */
  readonly isExported: boolean;
}

/** `#[name(args)]` */
export interface Attribute {
  readonly name: string;
  readonly args: Expr[];
}

export interface AttrStmt extends BaseNode {
  readonly type: 'AttrStmt';
  readonly attr: Attribute;
  readonly statement: Stmt;
}

export interface StructField {
  readonly name: string;
  readonly fieldType: TypeNode;
}

/** `def Point { x: num, y: num }` */
export interface StructDeclStmt extends BaseNode {
  readonly type: 'StructDecl';
  readonly name: string;
  readonly fields: StructField[];
}

/** `impl Trait for Type { ... }` or `impl Type { ... }` */
export interface ImplBlockStmt extends BaseNode {
  readonly type: 'ImplBlock';
  readonly typeName: string;
  readonly traitName: string | null;
  readonly methods: FunctionDeclStmt[];
}

export interface TraitSignature {
  readonly type: 'Signature';
  readonly name: string;
  readonly params: Param[];
  readonly returnType: TypeNode;
}

export interface TraitDefault {
  readonly type: 'Default';
  readonly name: string;
  readonly params: Param[];
  readonly returnType: TypeNode;
  readonly body: BlockStmt;
}

export type TraitMethod = TraitSignature | TraitDefault;

export interface TraitDeclStmt extends BaseNode {
  readonly type: 'TraitDecl';
  readonly name: string;
  readonly methods: TraitMethod[];
}

/** A variant with `fields: null` has no payload; `Some(num)` has one */
export interface EnumVariant {
  readonly name: string;
  readonly fields: TypeNode[] | null;
}

export interface EnumDeclStmt extends BaseNode {
  readonly type: 'EnumDecl';
  readonly name: string;
  readonly variants: EnumVariant[];
}

// ============================================================
// STATEMENTS
// ============================================================

export interface AssignStmt extends BaseNode {
  readonly type: 'Assign';
  readonly name: string;
  readonly value: Expr;
}

export interface IfStmt extends BaseNode {
  readonly type: 'If';
  readonly condition: Expr;
  readonly thenBranch: Stmt;
  readonly elseBranch: Stmt | null;
}

export interface WhileStmt extends BaseNode {
  readonly type: 'While';
  readonly condition: Expr;
  readonly body: Stmt;
}

export interface ForStmt extends BaseNode {
  readonly type: 'For';
  readonly variable: string;
  readonly iterable: Expr;
  readonly body: BlockStmt;
}

export interface MatchStmtArm {
  readonly pattern: Expr;
  readonly body: Stmt;
}

export interface MatchStmt extends BaseNode {
  readonly type: 'Match';
  readonly expression: Expr;
  readonly arms: MatchStmtArm[];
}

export interface ReturnStmt extends BaseNode {
  readonly type: 'Return';
  readonly value: Expr | null;
}

export interface BreakStmt extends BaseNode {
  readonly type: 'Break';
}

export interface ContinueStmt extends BaseNode {
  readonly type: 'Continue';
}

export interface ExprStmt extends BaseNode {
  readonly type: 'Expr';
  readonly expression: Expr;
}

export interface BlockStmt extends BaseNode {
  readonly type: 'Block';
  readonly statements: Stmt[];
}

export type Stmt =
  | ImportDeclStmt
  | VarDeclStmt
  | ConstDeclStmt
  | FunctionDeclStmt
  | AttrStmt
  | StructDeclStmt
  | ImplBlockStmt
  | TraitDeclStmt
  | EnumDeclStmt
  | AssignStmt
  | IfStmt
  | WhileStmt
  | ForStmt
  | MatchStmt
  | ReturnStmt
  | BreakStmt
  | ContinueStmt
  | ExprStmt
  | BlockStmt;
