import { MatchKind } from '../../types/model';
import { Expression, Statement } from '../../types/syntax';
import { bodyStatements, isBooleanLiteral, stripParens } from '../syntax/SyntaxQueries';

export interface MatchDetection {
  matchKind: MatchKind;
  condition: Expression;
}

export class MatchPatternDetector {
  /**
   * `if (cond) return B;` inside the loop followed by `return !B;` after it.
   * Returning true inside is anyMatch; returning false inside is noneMatch, or
   * allMatch on the inner condition when `cond` is a negation.
   */
  static detect(statement: Statement, nextStatement: Statement | undefined): MatchDetection | null {
    if (statement.kind !== 'if' || statement.elseStatement) return null;
    const inner = bodyStatements(statement.thenStatement);
    if (inner.length !== 1) return null;
    const [only] = inner;
    const returnedInside = booleanReturn(only);
    const returnedAfter = booleanReturn(nextStatement);
    if (returnedInside === undefined || returnedAfter === undefined || returnedInside === returnedAfter) return null;

    if (returnedInside) {
      return { matchKind: MatchKind.ANY, condition: statement.condition };
    }
    const condition = stripParens(statement.condition);
    if (condition.kind === 'unary' && condition.operator === '!') {
      return { matchKind: MatchKind.ALL, condition: stripParens(condition.operand) };
    }
    return { matchKind: MatchKind.NONE, condition: statement.condition };
  }
}

function booleanReturn(statement: Statement | undefined): boolean | undefined {
  if (!statement || statement.kind !== 'return' || !statement.expression) return undefined;
  if (isBooleanLiteral(statement.expression, true)) return true;
  if (isBooleanLiteral(statement.expression, false)) return false;
  return undefined;
}
