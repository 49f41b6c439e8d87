import { CheckResult, NotConvertibleReason } from '../../types/analysis';
import { LoopModel, OperationKind, TerminalKind } from '../../types/model';
import { Expression, Statement } from '../../types/syntax';
import { referencedNames } from '../syntax/SyntaxQueries';

/**
 * Replays a model stage by stage and checks that every loop-local name a stage
 * reads is still bound there. A map that produces a new name takes the previous
 * pipeline variable out of scope.
 */
export class PipelineScopeValidator {
  static validate(model: LoopModel): CheckResult {
    const loopLocals = new Set<string>([model.element.name]);
    for (const operation of model.operations) {
      if (operation.kind === OperationKind.MAP) loopLocals.add(operation.producedVariableName);
    }

    const available = new Set<string>([model.element.name]);
    let current = model.element.name;

    for (const [index, operation] of model.operations.entries()) {
      const stage = `${operation.kind} #${index + 1}`;
      const consumed = operation.kind === OperationKind.MAP ? operation.expression : operation.predicate;
      const missing = this.missingNames([consumed], loopLocals, available);
      if (missing.length > 0) return this.violation(missing, stage);

      if (operation.kind === OperationKind.MAP && operation.producedVariableName !== current) {
        available.delete(current);
        available.add(operation.producedVariableName);
        current = operation.producedVariableName;
      }
    }

    const terminal = model.terminal;
    if (terminal?.kind === TerminalKind.FOR_EACH) {
      const missing = this.missingNames(terminal.bodyStatements, loopLocals, available);
      if (missing.length > 0) return this.violation(missing, terminal.kind);
    }
    if (terminal?.kind === TerminalKind.MATCH) {
      const missing = this.missingNames([terminal.condition], loopLocals, available);
      if (missing.length > 0) return this.violation(missing, terminal.kind);
    }
    return { ok: true };
  }

  private static missingNames(
    nodes: ReadonlyArray<Expression | Statement>,
    loopLocals: ReadonlySet<string>,
    available: ReadonlySet<string>
  ): string[] {
    return [...referencedNames(nodes)].filter(used => loopLocals.has(used) && !available.has(used));
  }

  private static violation(missing: string[], stage: string): CheckResult {
    return {
      ok: false,
      reason: NotConvertibleReason.SCOPE_VIOLATION,
      detail: `${missing.join(', ')} not in scope at ${stage}`
    };
  }
}
