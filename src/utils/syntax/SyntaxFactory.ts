import {
  AssignmentExpression,
  AssignmentOperator,
  BinaryExpression,
  BlockStatement,
  BreakStatement,
  CallExpression,
  CastExpression,
  ConditionalExpression,
  ContinueStatement,
  EnhancedForStatement,
  Expression,
  ExpressionStatement,
  FieldAccessExpression,
  ForStatement,
  IfStatement,
  LabeledStatement,
  LambdaExpression,
  LambdaParameter,
  LiteralExpression,
  LoopElement,
  MethodReferenceExpression,
  NameExpression,
  NewExpression,
  ParenthesizedExpression,
  PostfixExpression,
  PostfixOperator,
  PrefixOperator,
  ReturnStatement,
  Statement,
  UnaryExpression,
  VariableDeclarationStatement,
  WhileStatement
} from '../../types/syntax';
import { precedenceOf } from './SyntaxPrinter';
import { stripParens } from './SyntaxQueries';

export function name(identifier: string, type?: string): NameExpression {
  return type === undefined ? { kind: 'name', identifier } : { kind: 'name', identifier, type };
}

export function numberLiteral(value: string | number): LiteralExpression {
  return { kind: 'literal', literalKind: 'number', value: String(value) };
}

export function stringLiteral(text: string): LiteralExpression {
  return { kind: 'literal', literalKind: 'string', value: JSON.stringify(text) };
}

export function booleanLiteral(value: boolean): LiteralExpression {
  return { kind: 'literal', literalKind: 'boolean', value: String(value) };
}

export function nullLiteral(): LiteralExpression {
  return { kind: 'literal', literalKind: 'null', value: 'null' };
}

export function call(receiver: Expression | undefined, method: string, ...args: Expression[]): CallExpression {
  return receiver === undefined ? { kind: 'call', method, args } : { kind: 'call', receiver, method, args };
}

export function field(receiver: Expression, fieldName: string): FieldAccessExpression {
  return { kind: 'field', receiver, name: fieldName };
}

export function newInstance(typeName: string, ...args: Expression[]): NewExpression {
  return { kind: 'new', typeName, args };
}

export function prefix(operator: PrefixOperator, operand: Expression): UnaryExpression {
  return { kind: 'unary', operator, operand };
}

export function postfix(operator: PostfixOperator, operand: Expression): PostfixExpression {
  return { kind: 'postfix', operator, operand };
}

export function binary(left: Expression, operator: string, right: Expression): BinaryExpression {
  return { kind: 'binary', operator, left, right };
}

export function assign(target: Expression, value: Expression, operator: AssignmentOperator = '='): AssignmentExpression {
  return { kind: 'assign', operator, target, value };
}

export function paren(expression: Expression): ParenthesizedExpression {
  return { kind: 'paren', expression };
}

export function cast(typeName: string, expression: Expression): CastExpression {
  return { kind: 'cast', typeName, expression };
}

export function conditional(condition: Expression, whenTrue: Expression, whenFalse: Expression): ConditionalExpression {
  return { kind: 'conditional', condition, whenTrue, whenFalse };
}

export function lambda(parameters: Array<string | LambdaParameter>, body: Expression | BlockStatement): LambdaExpression {
  return {
    kind: 'lambda',
    parameters: parameters.map(parameter => (typeof parameter === 'string' ? { name: parameter } : parameter)),
    body
  };
}

export function methodRef(target: string, method: string): MethodReferenceExpression {
  return { kind: 'methodRef', target, method };
}

export function block(...statements: Statement[]): BlockStatement {
  return { kind: 'block', statements };
}

export function expressionStatement(expression: Expression): ExpressionStatement {
  return { kind: 'expression', expression };
}

export function declaration(typeName: string, variableName: string, initializer?: Expression): VariableDeclarationStatement {
  return initializer === undefined
    ? { kind: 'declaration', typeName, name: variableName }
    : { kind: 'declaration', typeName, name: variableName, initializer };
}

export function ifStatement(condition: Expression, thenStatement: Statement, elseStatement?: Statement): IfStatement {
  return elseStatement === undefined
    ? { kind: 'if', condition, thenStatement }
    : { kind: 'if', condition, thenStatement, elseStatement };
}

export function returnStatement(expression?: Expression): ReturnStatement {
  return expression === undefined ? { kind: 'return' } : { kind: 'return', expression };
}

export function breakStatement(label?: string): BreakStatement {
  return label === undefined ? { kind: 'break' } : { kind: 'break', label };
}

export function continueStatement(label?: string): ContinueStatement {
  return label === undefined ? { kind: 'continue' } : { kind: 'continue', label };
}

export function forEachLoop(element: LoopElement, iterable: Expression, body: Statement): EnhancedForStatement {
  return { kind: 'forEach', element, iterable, body };
}

export function forLoop(
  initializer: VariableDeclarationStatement | undefined,
  condition: Expression | undefined,
  updaters: Expression[],
  body: Statement
): ForStatement {
  const statement: ForStatement = { kind: 'for', updaters, body };
  if (initializer !== undefined) statement.initializer = initializer;
  if (condition !== undefined) statement.condition = condition;
  return statement;
}

export function whileLoop(condition: Expression, body: Statement): WhileStatement {
  return { kind: 'while', condition, body };
}

export function labeled(label: string, body: Statement): LabeledStatement {
  return { kind: 'labeled', label, body };
}

/**
 * Logical negation with double negation removed: `!p` becomes `p`, anything
 * else becomes `!p` with parentheses where precedence needs them.
 */
export function negate(condition: Expression): Expression {
  const stripped = stripParens(condition);
  if (stripped.kind === 'unary' && stripped.operator === '!') {
    return stripParens(stripped.operand);
  }
  return precedenceOf(stripped) < precedenceOf(prefix('!', stripped)) ? prefix('!', paren(stripped)) : prefix('!', stripped);
}
