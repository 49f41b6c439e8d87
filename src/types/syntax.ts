/**
 * Read-only view of the host syntax tree. Every node is plain data so a method
 * can be handed over as JSON; `type` carries the resolved type binding when the
 * host has one.
 */

export type LiteralKind = 'number' | 'string' | 'char' | 'boolean' | 'null';

export type PrefixOperator = '!' | '-' | '+' | '~' | '++' | '--';
export type PostfixOperator = '++' | '--';
export type AssignmentOperator = '=' | '+=' | '-=' | '*=' | '/=' | '%=' | '&=' | '|=' | '^=' | '<<=' | '>>=' | '>>>=';

export interface NameExpression {
  kind: 'name';
  identifier: string;
  type?: string;
}

export interface LiteralExpression {
  kind: 'literal';
  literalKind: LiteralKind;
  /** Source text of the literal, quotes and suffixes included. */
  value: string;
  type?: string;
}

export interface ThisExpression {
  kind: 'this';
  type?: string;
}

export interface FieldAccessExpression {
  kind: 'field';
  receiver: Expression;
  name: string;
  type?: string;
}

export interface CallExpression {
  kind: 'call';
  receiver?: Expression;
  method: string;
  args: Expression[];
  type?: string;
}

export interface NewExpression {
  kind: 'new';
  typeName: string;
  args: Expression[];
  type?: string;
}

export interface UnaryExpression {
  kind: 'unary';
  operator: PrefixOperator;
  operand: Expression;
  type?: string;
}

export interface PostfixExpression {
  kind: 'postfix';
  operator: PostfixOperator;
  operand: Expression;
  type?: string;
}

export interface BinaryExpression {
  kind: 'binary';
  operator: string;
  left: Expression;
  right: Expression;
  type?: string;
}

export interface AssignmentExpression {
  kind: 'assign';
  operator: AssignmentOperator;
  target: Expression;
  value: Expression;
  type?: string;
}

export interface ParenthesizedExpression {
  kind: 'paren';
  expression: Expression;
  type?: string;
}

export interface CastExpression {
  kind: 'cast';
  typeName: string;
  expression: Expression;
  type?: string;
}

export interface ConditionalExpression {
  kind: 'conditional';
  condition: Expression;
  whenTrue: Expression;
  whenFalse: Expression;
  type?: string;
}

export interface ArrayAccessExpression {
  kind: 'index';
  array: Expression;
  index: Expression;
  type?: string;
}

export interface LambdaParameter {
  name: string;
  typeName?: string;
}

export interface LambdaExpression {
  kind: 'lambda';
  parameters: LambdaParameter[];
  body: Expression | BlockStatement;
  type?: string;
}

export interface MethodReferenceExpression {
  kind: 'methodRef';
  /** Type name or expression text left of `::`. */
  target: string;
  method: string;
  type?: string;
}

export type Expression =
  | NameExpression
  | LiteralExpression
  | ThisExpression
  | FieldAccessExpression
  | CallExpression
  | NewExpression
  | UnaryExpression
  | PostfixExpression
  | BinaryExpression
  | AssignmentExpression
  | ParenthesizedExpression
  | CastExpression
  | ConditionalExpression
  | ArrayAccessExpression
  | LambdaExpression
  | MethodReferenceExpression;

export interface BlockStatement {
  kind: 'block';
  statements: Statement[];
}

export interface ExpressionStatement {
  kind: 'expression';
  expression: Expression;
}

export interface VariableDeclarationStatement {
  kind: 'declaration';
  typeName: string;
  name: string;
  initializer?: Expression;
  isFinal?: boolean;
  annotations?: string[];
}

export interface IfStatement {
  kind: 'if';
  condition: Expression;
  thenStatement: Statement;
  elseStatement?: Statement;
}

export interface ReturnStatement {
  kind: 'return';
  expression?: Expression;
}

export interface BreakStatement {
  kind: 'break';
  label?: string;
}

export interface ContinueStatement {
  kind: 'continue';
  label?: string;
}

export interface ThrowStatement {
  kind: 'throw';
  expression: Expression;
}

export interface LoopElement {
  name: string;
  typeName: string;
  isFinal?: boolean;
  annotations?: string[];
}

export interface EnhancedForStatement {
  kind: 'forEach';
  element: LoopElement;
  iterable: Expression;
  body: Statement;
}

export interface ForStatement {
  kind: 'for';
  initializer?: VariableDeclarationStatement;
  condition?: Expression;
  updaters: Expression[];
  body: Statement;
}

export interface WhileStatement {
  kind: 'while';
  condition: Expression;
  body: Statement;
}

export interface DoWhileStatement {
  kind: 'doWhile';
  body: Statement;
  condition: Expression;
}

export interface LabeledStatement {
  kind: 'labeled';
  label: string;
  body: Statement;
}

export interface CatchClause {
  exceptionType: string;
  name: string;
  body: BlockStatement;
}

export interface TryStatement {
  kind: 'try';
  block: BlockStatement;
  catches: CatchClause[];
  finallyBlock?: BlockStatement;
}

export interface SwitchCase {
  /** Empty for `default`. */
  labels: Expression[];
  statements: Statement[];
}

export interface SwitchStatement {
  kind: 'switch';
  selector: Expression;
  cases: SwitchCase[];
}

export interface SynchronizedStatement {
  kind: 'synchronized';
  lock: Expression;
  body: BlockStatement;
}

export interface EmptyStatement {
  kind: 'empty';
}

export type Statement =
  | BlockStatement
  | ExpressionStatement
  | VariableDeclarationStatement
  | IfStatement
  | ReturnStatement
  | BreakStatement
  | ContinueStatement
  | ThrowStatement
  | EnhancedForStatement
  | ForStatement
  | WhileStatement
  | DoWhileStatement
  | LabeledStatement
  | TryStatement
  | SwitchStatement
  | SynchronizedStatement
  | EmptyStatement;

export type LoopStatement = EnhancedForStatement | ForStatement | WhileStatement | DoWhileStatement;

export interface ParameterBinding {
  name: string;
  typeName: string;
  isFinal?: boolean;
  annotations?: string[];
}

export interface FieldBinding extends ParameterBinding {
  initializer?: Expression;
}

export interface MethodSource {
  name: string;
  parameters?: ParameterBinding[];
  fields?: FieldBinding[];
  body: BlockStatement;
}

/**
 * Address of a statement inside a method body. Numbers index statement lists;
 * strings name single-statement slots (`then`, `else`, `body`, `try`,
 * `finally`, `catch:N`, `case:N`).
 */
export type PathSegment = number | string;
export type StatementPath = readonly PathSegment[];

export function pathKey(path: StatementPath): string {
  return path.join('/');
}
