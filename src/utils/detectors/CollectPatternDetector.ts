import { CollectorKind, SourceKind } from '../../types/model';
import { Expression, Statement } from '../../types/syntax';
import { JavaTypes } from '../syntax/JavaTypes';
import { isNameOf, stripParens } from '../syntax/SyntaxQueries';
import { TypeEnvironment } from '../syntax/TypeEnvironment';

export interface CollectDetection {
  targetVariableName: string;
  targetTypeName?: string;
  collectorKind: CollectorKind;
  /** Added value when it differs from the current pipeline variable. */
  mappedExpression?: Expression;
}

export class CollectPatternDetector {
  /** `target.add(expr);` on a collection declared outside the loop. */
  static detect(
    statement: Statement,
    currentVariable: string,
    loopLocals: ReadonlySet<string>,
    environment: TypeEnvironment
  ): CollectDetection | null {
    if (statement.kind !== 'expression') return null;
    const expression = statement.expression;
    if (expression.kind !== 'call' || expression.method !== 'add' || expression.args.length !== 1) return null;
    const receiver = expression.receiver ? stripParens(expression.receiver) : undefined;
    if (!receiver || receiver.kind !== 'name') return null;

    const targetVariableName = receiver.identifier;
    if (targetVariableName === currentVariable || loopLocals.has(targetVariableName)) return null;

    const targetTypeName = environment.typeOf(receiver);
    if (targetTypeName !== undefined && JavaTypes.sourceKindOf(targetTypeName) !== SourceKind.COLLECTION) return null;

    const [added] = expression.args;
    if (added === undefined) return null;

    const detection: CollectDetection = {
      targetVariableName,
      collectorKind: targetTypeName !== undefined && JavaTypes.isSetType(targetTypeName) ? CollectorKind.TO_SET : CollectorKind.TO_LIST
    };
    if (targetTypeName !== undefined) detection.targetTypeName = targetTypeName;
    if (!isNameOf(added, currentVariable)) detection.mappedExpression = added;
    return detection;
  }
}
