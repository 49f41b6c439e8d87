import {
  BlockStatement,
  Expression,
  LambdaExpression,
  Statement,
  VariableDeclarationStatement
} from '../../types/syntax';

const INDENT = '    ';

const BINARY_PRECEDENCE: Record<string, number> = {
  '||': 3,
  '&&': 4,
  '|': 5,
  '^': 6,
  '&': 7,
  '==': 8,
  '!=': 8,
  '<': 9,
  '>': 9,
  '<=': 9,
  '>=': 9,
  'instanceof': 9,
  '<<': 10,
  '>>': 10,
  '>>>': 10,
  '+': 11,
  '-': 11,
  '*': 12,
  '/': 12,
  '%': 12
};

const PRIMARY = 15;
const POSTFIX = 14;
const PREFIX = 13;
const CONDITIONAL = 2;
const ASSIGNMENT = 1;
const LAMBDA = 0;

export function precedenceOf(expression: Expression): number {
  switch (expression.kind) {
    case 'postfix':
      return POSTFIX;
    case 'unary':
    case 'cast':
      return PREFIX;
    case 'binary':
      return BINARY_PRECEDENCE[expression.operator] ?? PREFIX - 1;
    case 'conditional':
      return CONDITIONAL;
    case 'assign':
      return ASSIGNMENT;
    case 'lambda':
      return LAMBDA;
    default:
      return PRIMARY;
  }
}

/**
 * Prints syntax nodes as host source text. Parentheses are added wherever the
 * tree shape would otherwise be re-associated by operator precedence.
 */
export class SyntaxPrinter {
  static printExpression(expression: Expression, level: number = 0): string {
    switch (expression.kind) {
      case 'name':
        return expression.identifier;
      case 'literal':
        return expression.value;
      case 'this':
        return 'this';
      case 'field':
        return `${this.operand(expression.receiver, PRIMARY, level)}.${expression.name}`;
      case 'call': {
        const args = expression.args.map(arg => this.printExpression(arg, level)).join(', ');
        const receiver = expression.receiver ? `${this.operand(expression.receiver, PRIMARY, level)}.` : '';
        return `${receiver}${expression.method}(${args})`;
      }
      case 'new':
        return `new ${expression.typeName}(${expression.args.map(arg => this.printExpression(arg, level)).join(', ')})`;
      case 'unary': {
        const operand = this.operand(expression.operand, PREFIX, level);
        const clashes = (expression.operator === '-' || expression.operator === '+') && operand.startsWith(expression.operator);
        return clashes ? `${expression.operator}(${operand})` : `${expression.operator}${operand}`;
      }
      case 'postfix':
        return `${this.operand(expression.operand, POSTFIX, level)}${expression.operator}`;
      case 'binary': {
        const precedence = precedenceOf(expression);
        const left = this.operand(expression.left, precedence, level);
        const right = this.operand(expression.right, precedence + 1, level);
        return `${left} ${expression.operator} ${right}`;
      }
      case 'assign':
        return `${this.operand(expression.target, POSTFIX, level)} ${expression.operator} ${this.operand(expression.value, ASSIGNMENT, level)}`;
      case 'paren':
        return `(${this.printExpression(expression.expression, level)})`;
      case 'cast':
        return `(${expression.typeName}) ${this.operand(expression.expression, PREFIX, level)}`;
      case 'conditional':
        return `${this.operand(expression.condition, CONDITIONAL + 1, level)} ? ${this.operand(expression.whenTrue, CONDITIONAL, level)} : ${this.operand(expression.whenFalse, CONDITIONAL, level)}`;
      case 'index':
        return `${this.operand(expression.array, PRIMARY, level)}[${this.printExpression(expression.index, level)}]`;
      case 'lambda':
        return this.printLambda(expression, level);
      case 'methodRef':
        return `${expression.target}::${expression.method}`;
    }
  }

  static printStatement(statement: Statement, level: number = 0): string {
    const pad = INDENT.repeat(level);
    switch (statement.kind) {
      case 'block':
        return `${pad}${this.printBlock(statement, level)}`;
      case 'expression':
        return `${pad}${this.printExpression(statement.expression, level)};`;
      case 'declaration':
        return `${pad}${this.printDeclaration(statement, level)};`;
      case 'if': {
        let text = `${pad}if (${this.printExpression(statement.condition, level)})${this.printBody(statement.thenStatement, level)}`;
        if (statement.elseStatement) {
          const separator = statement.thenStatement.kind === 'block' ? ' ' : `\n${pad}`;
          const elseText = statement.elseStatement.kind === 'if'
            ? ` ${this.printStatement(statement.elseStatement, level).trimStart()}`
            : this.printBody(statement.elseStatement, level);
          text += `${separator}else${elseText}`;
        }
        return text;
      }
      case 'return':
        return statement.expression
          ? `${pad}return ${this.printExpression(statement.expression, level)};`
          : `${pad}return;`;
      case 'break':
        return statement.label ? `${pad}break ${statement.label};` : `${pad}break;`;
      case 'continue':
        return statement.label ? `${pad}continue ${statement.label};` : `${pad}continue;`;
      case 'throw':
        return `${pad}throw ${this.printExpression(statement.expression, level)};`;
      case 'forEach': {
        const modifier = statement.element.isFinal ? 'final ' : '';
        const header = `${modifier}${statement.element.typeName} ${statement.element.name} : ${this.printExpression(statement.iterable, level)}`;
        return `${pad}for (${header})${this.printBody(statement.body, level)}`;
      }
      case 'for': {
        const init = statement.initializer ? this.printDeclaration(statement.initializer, level) : '';
        const condition = statement.condition ? ` ${this.printExpression(statement.condition, level)}` : '';
        const updaters = statement.updaters.map(updater => this.printExpression(updater, level)).join(', ');
        return `${pad}for (${init};${condition};${updaters ? ` ${updaters}` : ''})${this.printBody(statement.body, level)}`;
      }
      case 'while':
        return `${pad}while (${this.printExpression(statement.condition, level)})${this.printBody(statement.body, level)}`;
      case 'doWhile': {
        const body = this.printBody(statement.body, level);
        const separator = statement.body.kind === 'block' ? ' ' : `\n${pad}`;
        return `${pad}do${body}${separator}while (${this.printExpression(statement.condition, level)});`;
      }
      case 'labeled':
        return `${pad}${statement.label}: ${this.printStatement(statement.body, level).trimStart()}`;
      case 'try': {
        let text = `${pad}try ${this.printBlock(statement.block, level)}`;
        for (const clause of statement.catches) {
          text += ` catch (${clause.exceptionType} ${clause.name}) ${this.printBlock(clause.body, level)}`;
        }
        if (statement.finallyBlock) {
          text += ` finally ${this.printBlock(statement.finallyBlock, level)}`;
        }
        return text;
      }
      case 'switch': {
        const lines = [`${pad}switch (${this.printExpression(statement.selector, level)}) {`];
        for (const switchCase of statement.cases) {
          const label = switchCase.labels.length === 0
            ? 'default:'
            : `case ${switchCase.labels.map(label => this.printExpression(label, level)).join(', ')}:`;
          lines.push(`${pad}${INDENT}${label}`);
          switchCase.statements.forEach(inner => lines.push(this.printStatement(inner, level + 2)));
        }
        lines.push(`${pad}}`);
        return lines.join('\n');
      }
      case 'synchronized':
        return `${pad}synchronized (${this.printExpression(statement.lock, level)}) ${this.printBlock(statement.body, level)}`;
      case 'empty':
        return `${pad};`;
    }
  }

  static printStatements(statements: readonly Statement[], level: number = 0): string {
    return statements.map(statement => this.printStatement(statement, level)).join('\n');
  }

  /** Prints `{ ... }` without leading indentation; the closing brace sits at `level`. */
  static printBlock(block: BlockStatement, level: number): string {
    if (block.statements.length === 0) return '{}';
    return `{\n${this.printStatements(block.statements, level + 1)}\n${INDENT.repeat(level)}}`;
  }

  private static printBody(body: Statement, level: number): string {
    if (body.kind === 'block') return ` ${this.printBlock(body, level)}`;
    return `\n${this.printStatement(body, level + 1)}`;
  }

  private static printDeclaration(statement: VariableDeclarationStatement, level: number): string {
    const annotations = (statement.annotations ?? []).map(annotation => `@${annotation.replace(/^@/, '')} `).join('');
    const modifier = statement.isFinal ? 'final ' : '';
    const initializer = statement.initializer ? ` = ${this.printExpression(statement.initializer, level)}` : '';
    return `${annotations}${modifier}${statement.typeName} ${statement.name}${initializer}`;
  }

  private static printLambda(expression: LambdaExpression, level: number): string {
    const typed = expression.parameters.some(parameter => parameter.typeName !== undefined);
    const parameterList = expression.parameters
      .map(parameter => (parameter.typeName ? `${parameter.typeName} ${parameter.name}` : parameter.name))
      .join(', ');
    const parameters = expression.parameters.length === 1 && !typed ? parameterList : `(${parameterList})`;
    const body = expression.body.kind === 'block'
      ? this.printBlock(expression.body, level)
      : this.printExpression(expression.body, level);
    return `${parameters} -> ${body}`;
  }

  private static operand(expression: Expression, minimum: number, level: number): string {
    const text = this.printExpression(expression, level);
    return precedenceOf(expression) < minimum ? `(${text})` : text;
  }
}
