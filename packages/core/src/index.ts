/**
 * Loft Core
 * Exports the tokenizer, parser, AST types and error definitions
 */

// ============================================================
// LEXER
// ============================================================
export {
  DEFAULT_PATH,
  InputStream,
  KEYWORDS,
  OPERATOR_CHARS,
  PUNCTUATION,
  type StreamPosition,
  tokenize,
  Tokenizer,
  type TokenizerOptions,
} from './lexer/index.js';

export {
  describeToken,
  type MarkerToken,
  type NumberToken,
  type TextToken,
  type Token,
  type TokenType,
  TOKEN_TYPES,
} from './token-types.js';

// ============================================================
// PARSER
// ============================================================
export {
  createParserState,
  getPrecedence,
  MAX_LAMBDA_SCAN,
  parse,
  parseExpression,
  type ParseOptions,
  Parser,
  type ParseResult,
  parseRecoverable,
  type ParserState,
  TokenCursor,
} from './parser/index.js';

// ============================================================
// AST
// ============================================================
export type {
  NamedType,
  GenericType,
  FunctionType,
  TypeNode,
  NumberExpr,
  StringExpr,
  BooleanExpr,
  IdentExpr,
  BinOpExpr,
  UnaryOpExpr,
  CallExpr,
  FieldAccessExpr,
  IndexExpr,
  ArrayLiteralExpr,
  StructFieldInit,
  StructLiteralExpr,
  LambdaParam,
  LambdaExpr,
  BlockExpr,
  AwaitExpr,
  AsyncExpr,
  LazyExpr,
  TemplateText,
  TemplateExpression,
  TemplatePart,
  TemplateLiteralExpr,
  MatchExprArm,
  MatchExpr,
  TryExpr,
  Expr,
  ImportDeclStmt,
  VarDeclStmt,
  ConstDeclStmt,
  Param,
  FunctionDeclStmt,
  Attribute,
  AttrStmt,
  StructField,
  StructDeclStmt,
  ImplBlockStmt,
  TraitSignature,
  TraitDefault,
  TraitMethod,
  TraitDeclStmt,
  EnumVariant,
  EnumDeclStmt,
  AssignStmt,
  IfStmt,
  WhileStmt,
  ForStmt,
  MatchStmtArm,
  MatchStmt,
  ReturnStmt,
  BreakStmt,
  ContinueStmt,
  ExprStmt,
  BlockStmt,
  Stmt,
} from './ast-nodes.js';
export type { SourceLocation, SourceSpan } from './source-location.js';

// ============================================================
// ERRORS
// ============================================================
export {
  createError,
  type ErrorDetails,
  LexerError,
  LoftError,
  type LoftErrorData,
  ParseError,
} from './error-classes.js';

export {
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorExample,
  type ErrorRegistry,
  ERROR_REGISTRY,
  renderMessage,
} from './error-registry.js';
