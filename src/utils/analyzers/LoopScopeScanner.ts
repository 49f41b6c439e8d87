import { LoopCandidate, ScopeInfo } from '../../types/analysis';
import { MethodSource } from '../../types/syntax';
import { declaredNames, modifiedNames } from '../syntax/SyntaxQueries';

export class LoopScopeScanner {
  /**
   * Names a loop declares (element, header and body locals outside nested loop
   * bodies) and names written anywhere inside it.
   */
  static scanLoop(candidate: LoopCandidate): ScopeInfo {
    const declared = declaredNames(candidate.body, { enterLoops: false });
    const modified = modifiedNames(candidate.body);
    if (candidate.element) declared.add(candidate.element.name);
    for (const headerName of candidate.headerDeclared) {
      declared.add(headerName);
      modified.add(headerName);
    }
    return { declaredVariables: declared, modifiedVariables: modified };
  }

  /** Parameters and method-level locals, with every name the method writes. */
  static scanMethod(method: MethodSource): ScopeInfo {
    const declared = declaredNames(method.body.statements, { enterLoops: false });
    (method.parameters ?? []).forEach(parameter => declared.add(parameter.name));
    return { declaredVariables: declared, modifiedVariables: modifiedNames(method.body.statements) };
  }
}
