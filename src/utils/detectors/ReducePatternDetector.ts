import { ReducerKind } from '../../types/model';
import { Expression, Statement } from '../../types/syntax';
import { JavaTypes } from '../syntax/JavaTypes';
import { isNameOf, stripParens } from '../syntax/SyntaxQueries';
import { TypeEnvironment } from '../syntax/TypeEnvironment';

export interface ReduceDetection {
  reducerKind: ReducerKind;
  accumulatorVariableName: string;
  accumulatorTypeName?: string;
  /** Right-hand operand folded into the accumulator; absent for increments and decrements. */
  operand?: Expression;
}

const COMPOUND_REDUCERS: Record<string, ReducerKind> = {
  '+=': ReducerKind.SUM,
  '-=': ReducerKind.DIFFERENCE,
  '*=': ReducerKind.PRODUCT
};

export class ReducePatternDetector {
  /**
   * Accumulator updates: `acc += e`, `acc -= e`, `acc *= e`, `acc++`, `acc--`
   * and `acc = Math.max(acc, e)` / `Math.min`.
   */
  static detect(
    statement: Statement,
    currentVariable: string,
    loopLocals: ReadonlySet<string>,
    environment: TypeEnvironment
  ): ReduceDetection | null {
    if (statement.kind !== 'expression') return null;
    const expression = statement.expression;

    const detection = this.classify(expression);
    if (!detection) return null;
    const { accumulatorVariableName } = detection;
    if (accumulatorVariableName === currentVariable || loopLocals.has(accumulatorVariableName)) return null;

    const accumulatorTypeName = environment.lookup(accumulatorVariableName)?.typeName;
    if (accumulatorTypeName !== undefined) {
      detection.accumulatorTypeName = accumulatorTypeName;
      if (detection.reducerKind === ReducerKind.SUM && JavaTypes.isStringType(accumulatorTypeName)) {
        detection.reducerKind = ReducerKind.STRING_CONCAT;
      }
    }
    return detection;
  }

  private static classify(expression: Expression): ReduceDetection | null {
    if (expression.kind === 'postfix' || (expression.kind === 'unary' && (expression.operator === '++' || expression.operator === '--'))) {
      const operand = stripParens(expression.operand);
      if (operand.kind !== 'name') return null;
      return {
        reducerKind: expression.operator === '++' ? ReducerKind.INCREMENT : ReducerKind.DECREMENT,
        accumulatorVariableName: operand.identifier
      };
    }
    if (expression.kind !== 'assign') return null;
    const target = stripParens(expression.target);
    if (target.kind !== 'name') return null;

    const compound = COMPOUND_REDUCERS[expression.operator];
    if (compound !== undefined) {
      return { reducerKind: compound, accumulatorVariableName: target.identifier, operand: expression.value };
    }
    if (expression.operator !== '=') return null;

    const value = stripParens(expression.value);
    if (value.kind !== 'call' || value.args.length !== 2 || !value.receiver || !isNameOf(value.receiver, 'Math')) return null;
    if (value.method !== 'max' && value.method !== 'min') return null;
    const [first, second] = value.args;
    if (first === undefined || second === undefined) return null;

    const reducerKind = value.method === 'max' ? ReducerKind.MAX : ReducerKind.MIN;
    if (isNameOf(first, target.identifier)) {
      return { reducerKind, accumulatorVariableName: target.identifier, operand: second };
    }
    if (isNameOf(second, target.identifier)) {
      return { reducerKind, accumulatorVariableName: target.identifier, operand: first };
    }
    return null;
  }
}
