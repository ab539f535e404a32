/**
 * Loft Parser Tests: Expressions
 * Precedence, prefix and postfix operators, literals, lambdas and match
 */

import { describe, expect, it } from 'vitest';
import {
  getPrecedence,
  MAX_LAMBDA_SCAN,
  ParseError,
  parseExpression,
} from '@loft-lang/core';
import { catchError, sexpr } from '../helpers/ast.js';

function p(source: string): string {
  return sexpr(parseExpression(source));
}

describe('parseExpression', () => {
  describe('binary operators', () => {
    it('binds multiplication tighter than addition', () => {
      expect(p('1 + 2 * 3')).toBe('(+ 1 (* 2 3))');
      expect(p('1 * 2 + 3')).toBe('(+ (* 1 2) 3)');
    });

    it('folds equal precedence to the left', () => {
      expect(p('1 - 2 - 3')).toBe('(- (- 1 2) 3)');
      expect(p('a / b % c')).toBe('(% (/ a b) c)');
    });

    it('orders logical, comparison and bitwise operators', () => {
      expect(p('a || b && c == d')).toBe('(|| a (&& b (== c d)))');
      expect(p('a < b == c >= d')).toBe('(== (< a b) (>= c d))');
      expect(p('a | b ^ c & d')).toBe('(| a (^ b (& c d)))');
    });

    it('groups with parentheses', () => {
      expect(p('(1 + 2) * 3')).toBe('(* (+ 1 2) 3)');
      expect(p('(f(a)) + 1')).toBe('(+ (call f a) 1)');
    });

    it('folds operators outside the table at the loosest level', () => {
      expect(p('x += 1')).toBe('(+= x 1)');
      expect(p('a += b + c')).toBe('(+= a (+ b c))');
      expect(p('a + b += c')).toBe('(+= (+ a b) c)');
    });

    it('never reaches the shift operators', () => {
      expect(getPrecedence('<<')).toBe(8);
      const err = catchError(() => parseExpression('a << b'));
      expect(err.errorId).toBe('LOFT-P001');
      expect(err.message).toBe("Unexpected token in expression: '<' at 1:4");
    });

    it('reports precedence levels', () => {
      expect(getPrecedence('||')).toBe(1);
      expect(getPrecedence('*')).toBe(10);
      expect(getPrecedence('=>')).toBe(0);
    });

    it('spans a binary expression from left to right operand', () => {
      expect(parseExpression('1 + 23').span).toEqual({
        start: { line: 1, column: 1, offset: 0 },
        end: { line: 1, column: 7, offset: 6 },
      });
    });
  });

  describe('prefix operators', () => {
    it('applies to one operand', () => {
      expect(p('-x * 2')).toBe('(* (- x) 2)');
      expect(p('!a && b')).toBe('(&& (! a) b)');
      expect(p('--x')).toBe('(- (- x))');
    });

    it('applies after the postfix chain', () => {
      expect(p('-a.b')).toBe('(- (. a b))');
    });

    it('binds await, async and lazy to one operand', () => {
      expect(p('await f() + 1')).toBe('(+ (await (call f)) 1)');
      expect(p('async compute()')).toBe('(async (call compute))');
      expect(p('lazy x')).toBe('(lazy x)');
    });
  });

  describe('postfix chains', () => {
    it('parses calls', () => {
      expect(p('f(1, 2)')).toBe('(call f 1 2)');
      expect(p('f()')).toBe('(call f)');
      expect(p('f(1,)')).toBe('(call f 1)');
    });

    it('parses field access and indexing', () => {
      expect(p('a.b.c')).toBe('(. (. a b) c)');
      expect(p('a[0]')).toBe('(index a 0)');
      expect(p('obj.method(1)[2]')).toBe('(index (call (. obj method) 1) 2)');
    });

    it('parses the try operator', () => {
      expect(p('f(x)?')).toBe('(? (call f x))');
      expect(p('read()?.size')).toBe('(. (? (call read)) size)');
    });

    it('spans a call to its closing parenthesis', () => {
      expect(parseExpression('f(a)').span.end).toEqual({
        line: 1,
        column: 5,
        offset: 4,
      });
    });

    it('requires a comma between call arguments', () => {
      const err = catchError(() => parseExpression('f(1 2)'));
      expect(err.errorId).toBe('LOFT-P003');
      expect(err.message).toBe(
        "Expected ',' or ')' in function call but got 2 at 1:5"
      );
    });

    it('requires a field name after a dot', () => {
      const err = catchError(() => parseExpression('a.'));
      expect(err.errorId).toBe('LOFT-P004');
      expect(err.message).toBe("Expected field name after '.' but got EOF at 1:3");
    });
  });

  describe('literals', () => {
    it('parses numbers, strings and booleans', () => {
      expect(p('0.1 + 0.2')).toBe('(+ 0.1 0.2)');
      expect(p('"a" + "b"')).toBe('(+ "a" "b")');
      expect(p('true && !false')).toBe('(&& true (! false))');
    });

    it('keeps numbers exact', () => {
      const expr = parseExpression('0.1');
      expect(expr.type === 'Number' && expr.value.plus('0.2').toString()).toBe(
        '0.3'
      );
    });

    it('parses arrays with optional commas', () => {
      expect(p('[1, 2 3]')).toBe('[1 2 3]');
      expect(p('[]')).toBe('[]');
      expect(p('[a.b, f(1)]')).toBe('[(. a b) (call f 1)]');
    });

    it('parses struct literals after a bare identifier', () => {
      expect(p('Point { x: 1, y: 2 }')).toBe('(struct Point (x 1) (y 2))');
      expect(p('Point {}')).toBe('(struct Point)');
      expect(p('Line { a: Point { x: 0 } }')).toBe(
        '(struct Line (a (struct Point (x 0))))'
      );
    });

    it('does not read a brace after a call as a struct literal', () => {
      const err = catchError(() => parseExpression('f(x) {}'));
      expect(err.errorId).toBe('LOFT-P006');
      expect(err.message).toBe("Unexpected '{' after expression at 1:6");
    });

    it('parses block expressions', () => {
      expect(p('f({ let y = 1; y })')).toBe('(call f (block 2))');
    });
  });

  describe('template literals', () => {
    it('mixes text and interpolations', () => {
      expect(p('`hi ${name}!`')).toBe('(template "hi " name "!")');
      expect(p('`${a + b}`')).toBe('(template (+ a b))');
    });

    it('parses plain and empty templates', () => {
      expect(p('`plain`')).toBe('(template "plain")');
      expect(p('``')).toBe('(template)');
    });

    it('rejects an empty interpolation', () => {
      const err = catchError(() => parseExpression('`${}`'));
      expect(err.errorId).toBe('LOFT-P001');
      expect(err.message).toBe("Unexpected token in expression: '}' at 1:4");
    });

    it('requires one expression per interpolation', () => {
      const err = catchError(() => parseExpression('`${a b}`'));
      expect(err.errorId).toBe('LOFT-P003');
      expect(err.message).toBe(
        "Expected '}' after template expression but got 'b' at 1:6"
      );
    });
  });

  describe('lambdas', () => {
    it('parses a single bare parameter', () => {
      expect(p('x => x + 1')).toBe('(lambda (x) (+ x 1))');
      expect(p('f(x => x * 2)')).toBe('(call f (lambda (x) (* x 2)))');
    });

    it('parses parenthesized parameters with optional types', () => {
      expect(p('(a, b: num) => a * b')).toBe('(lambda (a b:num) (* a b))');
      expect(p('() => 42')).toBe('(lambda () 42)');
      expect(p('(x) => { x }')).toBe('(lambda (x) (block 1))');
    });

    it('reads nested generic parameter types', () => {
      expect(p('(m: Map<str, Vec<num>>) => m')).toBe(
        '(lambda (m:Map<str, Vec<num>>) m)'
      );
      expect(p('xs.map((n: Vec<num>) => n)')).toBe(
        '(call (. xs map) (lambda (n:Vec<num>) n))'
      );
    });

    it('leaves the return type unset', () => {
      const expr = parseExpression('(a) => a');
      expect(expr.type === 'Lambda' && expr.returnType).toBeNull();
    });

    it('finds lambdas within the scan limit', () => {
      const names = Array.from({ length: 40 }, (_, i) => `p${i}`);
      const expr = parseExpression(`(${names.join(', ')}) => p0`);
      expect(expr.type === 'Lambda' && expr.params.length).toBe(40);
    });

    it('treats a longer parameter list as a grouped expression', () => {
      expect(MAX_LAMBDA_SCAN).toBe(100);
      const names = Array.from({ length: 60 }, () => 'a');
      const err = catchError(() => parseExpression(`(${names.join(', ')}) => a`));
      expect(err).toBeInstanceOf(ParseError);
      expect(err.message).toBe("Expected ')' but got ',' at 1:3");
    });
  });

  describe('match expressions', () => {
    it('parses arms', () => {
      expect(p('match x { 1 => "one", other => "many" }')).toBe(
        '(match x (1 "one") (other "many"))'
      );
    });

    it('parses constructor and alternative patterns', () => {
      expect(p('match opt { Some(v) => v, None => 0 }')).toBe(
        '(match opt ((call Some v) v) (None 0))'
      );
      expect(p('match n { 1 | 2 => a }')).toBe('(match n ((| 1 2) a))');
      expect(p('match c { Color.Red => 1 }')).toBe('(match c ((. Color Red) 1))');
    });

    it('does not read the arms brace as a struct literal', () => {
      expect(p('match p { Point => 1 }')).toBe('(match p (Point 1))');
    });

    it('suggests => when arms use ->', () => {
      const err = catchError(() => parseExpression('match x { 1 -> 2 }'));
      expect(err.errorId).toBe('LOFT-P003');
      expect(err.message).toBe("Expected operator '=>' but got '->' at 1:13");
      expect(err.help).toBe("Match arms and lambdas use '=>'");
    });
  });

  describe('errors', () => {
    it('rejects trailing tokens', () => {
      const err = catchError(() => parseExpression('1 2'));
      expect(err.errorId).toBe('LOFT-P006');
      expect(err.message).toBe('Unexpected 2 after expression at 1:3');
      expect(err.length).toBe(1);
    });

    it('allows one trailing semicolon', () => {
      expect(p('x;')).toBe('x');
      const err = catchError(() => parseExpression('1;;'));
      expect(err.message).toBe("Unexpected ';' after expression at 1:3");
    });

    it('reports end of input at the end location', () => {
      const err = catchError(() => parseExpression('1 +'));
      expect(err.errorId).toBe('LOFT-P002');
      expect(err.message).toBe('Unexpected end of input in expression at 1:4');
      expect(err.location).toEqual({ line: 1, column: 4, offset: 3 });
      expect(err.length).toBeUndefined();
    });

    it('reports an unexpected token', () => {
      const err = catchError(() => parseExpression(')', { path: 'expr.lf' }));
      expect(err.errorId).toBe('LOFT-P001');
      expect(err.message).toBe("Unexpected token in expression: ')' at 1:1");
      expect(err.path).toBe('expr.lf');
    });
  });
});
