/**
 * Parser Extension: Type Annotations
 */

import { Parser } from './parser.js';
import type { TypeNode } from '../ast-nodes.js';
import { checkOp, advance, expectIdent, expectOp, matchPunct } from './state.js';

declare module './parser.js' {
  interface Parser {
    parseType(): TypeNode;
  }
}

/**
 * `Name` or `Name<Arg, ...>` with nested arguments. Function types have no
 * surface syntax here.
 */
Parser.prototype.parseType = function (this: Parser): TypeNode {
  const name = expectIdent(this.state, 'type name');
  if (!checkOp(this.state, '<')) {
    return { type: 'NamedType', name };
  }
  advance(this.state);

  const typeArgs: TypeNode[] = [];
  do {
    typeArgs.push(this.parseType());
  } while (matchPunct(this.state, ','));
  expectOp(this.state, '>');

  return { type: 'GenericType', base: name, typeArgs };
};
