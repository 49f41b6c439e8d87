import { Expression, IfStatement, Statement } from '../../types/syntax';
import { negate } from '../syntax/SyntaxFactory';
import { bodyStatements } from '../syntax/SyntaxQueries';

export interface GuardedTail {
  predicate: Expression;
  body: Statement[];
}

export class FilterPatternDetector {
  /** `if (cond) continue;` keeps the elements for which `cond` is false. */
  static detectGuardContinue(statement: Statement): Expression | null {
    if (statement.kind !== 'if' || statement.elseStatement) return null;
    const inner = bodyStatements(statement.thenStatement);
    if (inner.length !== 1) return null;
    const [only] = inner;
    if (only === undefined || only.kind !== 'continue' || only.label !== undefined) return null;
    return negate(statement.condition);
  }

  /** A trailing `if (cond) { ... }` without else filters on `cond` and continues with its body. */
  static detectGuardedTail(statement: Statement): GuardedTail | null {
    if (!isPlainIf(statement)) return null;
    return { predicate: statement.condition, body: bodyStatements(statement.thenStatement) };
  }
}

function isPlainIf(statement: Statement): statement is IfStatement {
  return statement.kind === 'if' && statement.elseStatement === undefined;
}
