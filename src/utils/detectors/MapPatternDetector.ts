import { Expression, Statement } from '../../types/syntax';
import { stripParens } from '../syntax/SyntaxQueries';

export interface MapDetection {
  expression: Expression;
  producedVariableName: string;
  outputTypeName?: string;
}

export class MapPatternDetector {
  /** `T y = expr;` introduces `y` as the new pipeline variable. */
  static detectDeclaration(statement: Statement): MapDetection | null {
    if (statement.kind !== 'declaration' || !statement.initializer) return null;
    return {
      expression: statement.initializer,
      producedVariableName: statement.name,
      outputTypeName: statement.typeName
    };
  }

  /** `x = expr;` where `x` is the current pipeline variable. */
  static detectReassignment(statement: Statement, currentVariable: string): MapDetection | null {
    if (statement.kind !== 'expression') return null;
    const expression = statement.expression;
    if (expression.kind !== 'assign' || expression.operator !== '=') return null;
    const target = stripParens(expression.target);
    if (target.kind !== 'name' || target.identifier !== currentVariable) return null;
    return { expression: expression.value, producedVariableName: currentVariable };
  }
}
