import { CheckResult, NotConvertibleReason, ScopeInfo } from '../../types/analysis';
import { LoopModel, OperationKind, TerminalKind } from '../../types/model';
import { Expression, Statement } from '../../types/syntax';
import {
  declaredNames,
  isExpression,
  modifiedNames,
  modifiedNamesInExpression,
  referencedNames
} from '../syntax/SyntaxQueries';

/**
 * Checks on the parts of a model that end up inside lambdas: map and filter
 * expressions, the forEach body and the match condition.
 */
export class LambdaSafetyAnalyzer {
  static lambdaParts(model: LoopModel): Array<Expression | Statement> {
    const parts: Array<Expression | Statement> = model.operations.map(operation =>
      operation.kind === OperationKind.MAP ? operation.expression : operation.predicate
    );
    const terminal = model.terminal;
    if (terminal?.kind === TerminalKind.FOR_EACH) parts.push(...terminal.bodyStatements);
    if (terminal?.kind === TerminalKind.MATCH) parts.push(terminal.condition);
    return parts;
  }

  /** Element, map-produced names and locals declared inside the forEach body. */
  static loopLocalNames(model: LoopModel): Set<string> {
    const names = new Set<string>([model.element.name]);
    for (const operation of model.operations) {
      if (operation.kind === OperationKind.MAP) names.add(operation.producedVariableName);
    }
    if (model.terminal?.kind === TerminalKind.FOR_EACH) {
      declaredNames(model.terminal.bodyStatements).forEach(declared => names.add(declared));
    }
    return names;
  }

  static capturedNames(model: LoopModel): Set<string> {
    const locals = this.loopLocalNames(model);
    const captured = referencedNames(this.lambdaParts(model));
    return new Set([...captured].filter(captureName => !locals.has(captureName)));
  }

  /** Lambdas may only write loop-local variables. */
  static checkSideEffects(model: LoopModel): CheckResult {
    const locals = this.loopLocalNames(model);
    const written = new Set<string>();
    for (const part of this.lambdaParts(model)) {
      const names = isExpression(part) ? modifiedNamesInExpression(part) : modifiedNames([part]);
      names.forEach(writtenName => written.add(writtenName));
    }
    const escaping = [...written].filter(writtenName => !locals.has(writtenName));
    if (escaping.length > 0) {
      return { ok: false, reason: NotConvertibleReason.SIDE_EFFECT, detail: escaping.join(', ') };
    }
    return { ok: true };
  }

  /** Captured names must be effectively final in every enclosing scope. */
  static checkCapture(model: LoopModel, enclosingScopes: readonly ScopeInfo[]): CheckResult {
    const captured = this.capturedNames(model);
    const violations = new Set<string>();
    for (const scope of enclosingScopes) {
      for (const capturedName of captured) {
        if (scope.declaredVariables.has(capturedName) && scope.modifiedVariables.has(capturedName)) {
          violations.add(capturedName);
        }
      }
    }
    if (violations.size > 0) {
      return { ok: false, reason: NotConvertibleReason.CAPTURE_VIOLATION, detail: [...violations].join(', ') };
    }
    return { ok: true };
  }
}
