import { BlockStatement, Expression, LoopStatement, PathSegment, Statement } from '../../types/syntax';

export interface WalkOptions {
  /** Descend into the bodies of nested loops. */
  enterLoops?: boolean;
  /** Descend into lambda bodies. */
  enterLambdas?: boolean;
}

export interface SyntaxVisitor {
  /** Return `false` to skip the children of the statement. */
  statement?(statement: Statement): boolean | void;
  expression?(expression: Expression): void;
}

export interface ChildStatement {
  segment: PathSegment[];
  statement: Statement;
}

export function isLoopStatement(statement: Statement): statement is LoopStatement {
  return statement.kind === 'forEach' || statement.kind === 'for' || statement.kind === 'while' || statement.kind === 'doWhile';
}

export function stripParens(expression: Expression): Expression {
  let current = expression;
  while (current.kind === 'paren') {
    current = current.expression;
  }
  return current;
}

export function isBooleanLiteral(expression: Expression, value?: boolean): boolean {
  const stripped = stripParens(expression);
  if (stripped.kind !== 'literal' || stripped.literalKind !== 'boolean') return false;
  return value === undefined || stripped.value === String(value);
}

export function isNameOf(expression: Expression, identifier: string): boolean {
  const stripped = stripParens(expression);
  return stripped.kind === 'name' && stripped.identifier === identifier;
}

/** Name of a plain variable reference, also through `this.`. */
export function simpleNameOf(expression: Expression): string | undefined {
  const stripped = stripParens(expression);
  if (stripped.kind === 'name') return stripped.identifier;
  if (stripped.kind === 'field' && stripped.receiver.kind === 'this') return stripped.name;
  return undefined;
}

/** Statements of a body slot: the block's statements or the single statement. */
export function bodyStatements(body: Statement): Statement[] {
  return body.kind === 'block' ? body.statements : [body];
}

/** Direct child statements with the path segments leading to each of them. */
export function childStatements(statement: Statement): ChildStatement[] {
  const slot = (name: string, child: Statement): ChildStatement[] =>
    child.kind === 'block'
      ? child.statements.map((inner, index) => ({ segment: [name, index], statement: inner }))
      : [{ segment: [name], statement: child }];
  const list = (prefix: PathSegment[], statements: Statement[]): ChildStatement[] =>
    statements.map((inner, index) => ({ segment: [...prefix, index], statement: inner }));

  switch (statement.kind) {
    case 'block':
      return list([], statement.statements);
    case 'if':
      return [
        ...slot('then', statement.thenStatement),
        ...(statement.elseStatement ? slot('else', statement.elseStatement) : [])
      ];
    case 'forEach':
    case 'for':
    case 'while':
    case 'doWhile':
    case 'labeled':
      return slot('body', statement.body);
    case 'try':
      return [
        ...list(['try'], statement.block.statements),
        ...statement.catches.flatMap((clause, index) => list([`catch:${index}`], clause.body.statements)),
        ...(statement.finallyBlock ? list(['finally'], statement.finallyBlock.statements) : [])
      ];
    case 'switch':
      return statement.cases.flatMap((switchCase, index) => list([`case:${index}`], switchCase.statements));
    case 'synchronized':
      return list(['body'], statement.body.statements);
    default:
      return [];
  }
}

/** Expressions owned directly by a statement, nested statements excluded. */
export function ownExpressions(statement: Statement): Expression[] {
  switch (statement.kind) {
    case 'expression':
      return [statement.expression];
    case 'declaration':
      return statement.initializer ? [statement.initializer] : [];
    case 'if':
    case 'while':
    case 'doWhile':
      return [statement.condition];
    case 'return':
      return statement.expression ? [statement.expression] : [];
    case 'throw':
      return [statement.expression];
    case 'forEach':
      return [statement.iterable];
    case 'for':
      return [
        ...(statement.initializer?.initializer ? [statement.initializer.initializer] : []),
        ...(statement.condition ? [statement.condition] : []),
        ...statement.updaters
      ];
    case 'switch':
      return [statement.selector, ...statement.cases.flatMap(switchCase => switchCase.labels)];
    case 'synchronized':
      return [statement.lock];
    default:
      return [];
  }
}

export function childExpressions(expression: Expression): Array<Expression | BlockStatement> {
  switch (expression.kind) {
    case 'field':
      return [expression.receiver];
    case 'call':
      return expression.receiver ? [expression.receiver, ...expression.args] : expression.args;
    case 'new':
      return expression.args;
    case 'unary':
    case 'postfix':
      return [expression.operand];
    case 'binary':
      return [expression.left, expression.right];
    case 'assign':
      return [expression.target, expression.value];
    case 'paren':
    case 'cast':
      return [expression.expression];
    case 'conditional':
      return [expression.condition, expression.whenTrue, expression.whenFalse];
    case 'index':
      return [expression.array, expression.index];
    case 'lambda':
      return [expression.body];
    default:
      return [];
  }
}

export function walkExpression(expression: Expression, visitor: SyntaxVisitor, options: WalkOptions = {}): void {
  visitor.expression?.(expression);
  if (expression.kind === 'lambda' && options.enterLambdas === false) return;
  for (const child of childExpressions(expression)) {
    if (child.kind === 'block') {
      walkStatement(child, visitor, options);
    } else {
      walkExpression(child, visitor, options);
    }
  }
}

export function walkStatement(statement: Statement, visitor: SyntaxVisitor, options: WalkOptions = {}): void {
  if (visitor.statement?.(statement) === false) return;
  for (const expression of ownExpressions(statement)) {
    walkExpression(expression, visitor, options);
  }
  if (isLoopStatement(statement) && options.enterLoops === false) return;
  for (const child of childStatements(statement)) {
    walkStatement(child.statement, visitor, options);
  }
}

export function walkStatements(statements: readonly Statement[], visitor: SyntaxVisitor, options: WalkOptions = {}): void {
  statements.forEach(statement => walkStatement(statement, visitor, options));
}

export function containsStatement(
  statements: readonly Statement[],
  predicate: (statement: Statement) => boolean,
  options: WalkOptions = {}
): boolean {
  let found = false;
  walkStatements(statements, {
    statement: statement => {
      if (found) return false;
      if (predicate(statement)) {
        found = true;
        return false;
      }
      return undefined;
    }
  }, options);
  return found;
}

/** Variables declared by the statements: locals, loop elements and catch parameters. */
export function declaredNames(statements: readonly Statement[], options: WalkOptions = {}): Set<string> {
  const names = new Set<string>();
  walkStatements(statements, {
    statement: statement => {
      if (statement.kind === 'declaration') names.add(statement.name);
      if (statement.kind === 'forEach') names.add(statement.element.name);
      if (statement.kind === 'for' && statement.initializer) names.add(statement.initializer.name);
      if (statement.kind === 'try') statement.catches.forEach(clause => names.add(clause.name));
    }
  }, { enterLambdas: false, ...options });
  return names;
}

/** Variables written by assignment, increment or decrement. */
export function modifiedNames(statements: readonly Statement[], options: WalkOptions = {}): Set<string> {
  const names = new Set<string>();
  walkStatements(statements, { expression: expression => collectModified(expression, names) }, options);
  return names;
}

export function modifiedNamesInExpression(expression: Expression): Set<string> {
  const names = new Set<string>();
  walkExpression(expression, { expression: inner => collectModified(inner, names) });
  return names;
}

function collectModified(expression: Expression, names: Set<string>): void {
  if (expression.kind === 'assign') {
    const target = stripParens(expression.target);
    if (target.kind === 'name') names.add(target.identifier);
  }
  if ((expression.kind === 'unary' && (expression.operator === '++' || expression.operator === '--')) || expression.kind === 'postfix') {
    const operand = stripParens(expression.operand);
    if (operand.kind === 'name') names.add(operand.identifier);
  }
}

/**
 * Identifiers read or written by the nodes, names bound by lambda parameters
 * inside them excluded.
 */
export function referencedNames(nodes: ReadonlyArray<Expression | Statement>): Set<string> {
  const names = new Set<string>();
  nodes.forEach(node => collectReferenced(node, new Set<string>(), names));
  return names;
}

function collectReferenced(node: Expression | Statement, bound: ReadonlySet<string>, names: Set<string>): void {
  if (isExpression(node)) {
    if (node.kind === 'name') {
      if (!bound.has(node.identifier)) names.add(node.identifier);
      return;
    }
    if (node.kind === 'lambda') {
      const inner = new Set(bound);
      node.parameters.forEach(parameter => inner.add(parameter.name));
      collectReferenced(node.body, inner, names);
      return;
    }
    childExpressions(node).forEach(child => collectReferenced(child, bound, names));
    return;
  }
  ownExpressions(node).forEach(expression => collectReferenced(expression, bound, names));
  childStatements(node).forEach(child => collectReferenced(child.statement, bound, names));
}

const STATEMENT_KINDS = new Set<string>([
  'block', 'expression', 'declaration', 'if', 'return', 'break', 'continue', 'throw', 'forEach',
  'for', 'while', 'doWhile', 'labeled', 'try', 'switch', 'synchronized', 'empty'
]);

export function isExpression(node: Expression | Statement): node is Expression {
  return !STATEMENT_KINDS.has(node.kind);
}

/** Calls made on the given receiver name, `this.name` included. */
export function callsOn(statements: readonly Statement[], receiverName: string, options: WalkOptions = {}): string[] {
  const methods: string[] = [];
  walkStatements(statements, {
    expression: expression => {
      if (expression.kind === 'call' && expression.receiver && simpleNameOf(expression.receiver) === receiverName) {
        methods.push(expression.method);
      }
    }
  }, options);
  return methods;
}
