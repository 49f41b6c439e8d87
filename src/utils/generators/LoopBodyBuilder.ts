import {
  LoopModel,
  MapOperation,
  MatchKind,
  OperationKind,
  ReducerKind,
  Terminal,
  TerminalKind,
  UNUSED_PARAMETER_NAME
} from '../../types/model';
import { AssignmentOperator, Expression, Statement } from '../../types/syntax';
import { ReducerStrategy } from '../reducers/ReducerStrategy';
import {
  assign,
  block,
  booleanLiteral,
  call,
  continueStatement,
  declaration,
  expressionStatement,
  ifStatement,
  name,
  negate,
  postfix,
  returnStatement
} from '../syntax/SyntaxFactory';

const COMPOUND_OPERATORS: Partial<Record<ReducerKind, AssignmentOperator>> = {
  [ReducerKind.SUM]: '+=',
  [ReducerKind.STRING_CONCAT]: '+=',
  [ReducerKind.DIFFERENCE]: '-=',
  [ReducerKind.PRODUCT]: '*='
};

/**
 * Turns a model back into imperative loop body statements: filters become
 * `continue` guards, maps become declarations or reassignments and the
 * terminal becomes the final statement.
 */
export class LoopBodyBuilder {
  static build(model: LoopModel): Statement[] {
    const statements: Statement[] = [];
    const operations = model.operations;
    const folded = this.foldedOperation(model);
    let current = model.element.name;

    operations.forEach((operation, index) => {
      if (folded && index === operations.length - 1) return;
      if (operation.kind === OperationKind.FILTER) {
        statements.push(ifStatement(negate(operation.predicate), block(continueStatement())));
        return;
      }
      if (operation.producedVariableName === current) {
        statements.push(expressionStatement(assign(name(current), operation.expression)));
        return;
      }
      statements.push(declaration(operation.outputTypeName ?? 'var', operation.producedVariableName, operation.expression));
      current = operation.producedVariableName;
    });

    if (model.terminal) {
      const value = folded ? folded.expression : name(current);
      statements.push(...this.terminalStatements(model.terminal, value));
    }
    return statements;
  }

  /**
   * The trailing map a collect or reduce statement absorbs: the value passed to
   * `add` or folded into the accumulator, or the unit map of a counter.
   */
  private static foldedOperation(model: LoopModel): MapOperation | undefined {
    const terminal = model.terminal;
    if (!terminal || (terminal.kind !== TerminalKind.COLLECT && terminal.kind !== TerminalKind.REDUCE)) return undefined;
    const last = model.operations[model.operations.length - 1];
    if (!last || last.kind !== OperationKind.MAP) return undefined;

    if (terminal.kind === TerminalKind.REDUCE && ReducerStrategy.isCounting(terminal.reducerKind)) {
      return last.producedVariableName === UNUSED_PARAMETER_NAME ? last : undefined;
    }
    const previous = model.operations
      .slice(0, -1)
      .reduce((variable, operation) => (operation.kind === OperationKind.MAP ? operation.producedVariableName : variable), model.element.name);
    return last.producedVariableName === previous ? last : undefined;
  }

  private static terminalStatements(terminal: Terminal, value: Expression): Statement[] {
    switch (terminal.kind) {
      case TerminalKind.FOR_EACH:
        return [...terminal.bodyStatements];
      case TerminalKind.COLLECT:
        return [expressionStatement(call(name(terminal.targetVariableName), 'add', value))];
      case TerminalKind.REDUCE:
        return [this.reduceStatement(terminal.reducerKind, terminal.accumulatorVariableName, value)];
      case TerminalKind.MATCH:
        switch (terminal.matchKind) {
          case MatchKind.ANY:
            return [ifStatement(terminal.condition, block(returnStatement(booleanLiteral(true))))];
          case MatchKind.NONE:
            return [ifStatement(terminal.condition, block(returnStatement(booleanLiteral(false))))];
          case MatchKind.ALL:
            return [ifStatement(negate(terminal.condition), block(returnStatement(booleanLiteral(false))))];
        }
    }
  }

  private static reduceStatement(kind: ReducerKind, accumulatorName: string, value: Expression): Statement {
    const accumulator = name(accumulatorName);
    switch (kind) {
      case ReducerKind.INCREMENT:
        return expressionStatement(postfix('++', accumulator));
      case ReducerKind.DECREMENT:
        return expressionStatement(postfix('--', accumulator));
      case ReducerKind.MAX:
      case ReducerKind.MIN: {
        const method = kind === ReducerKind.MAX ? 'max' : 'min';
        return expressionStatement(assign(accumulator, call(name('Math'), method, accumulator, value)));
      }
      default:
        return expressionStatement(assign(accumulator, value, COMPOUND_OPERATORS[kind] ?? '+='));
    }
  }
}
