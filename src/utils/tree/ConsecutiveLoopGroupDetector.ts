import { ConversionDecision, LoopCandidate, LoopKind, ScopeInfo } from '../../types/analysis';
import { CollectTerminal, LoopModel, TerminalKind } from '../../types/model';
import { Statement, StatementPath } from '../../types/syntax';
import { ConvertibilityAnalyzer } from '../analyzers/ConvertibilityAnalyzer';
import { LoopCandidateReader } from '../extraction/LoopCandidateReader';
import { Logger } from '../Logger';

export interface GroupMember {
  candidate: LoopCandidate;
  model: LoopModel;
  terminal: CollectTerminal;
}

export interface ConsecutiveLoopGroup {
  id: number;
  targetVariableName: string;
  members: GroupMember[];
}

/**
 * Finds maximal runs of at least two adjacent enhanced for loops that each
 * append to the same collection, so they can be emitted as one concatenated
 * stream instead of overwriting the target once per loop.
 */
export class ConsecutiveLoopGroupDetector {
  private nextId = 0;

  constructor(private readonly analyzer: ConvertibilityAnalyzer) {}

  detect(siblings: readonly Statement[], listPath: StatementPath, enclosingScopes: readonly ScopeInfo[]): ConsecutiveLoopGroup[] {
    const groups: ConsecutiveLoopGroup[] = [];
    let run: GroupMember[] = [];

    const flush = () => {
      if (run.length >= 2) {
        const [first] = run;
        if (first) {
          groups.push({ id: this.nextId++, targetVariableName: first.terminal.targetVariableName, members: run });
        }
      }
      run = [];
    };

    siblings.forEach((statement, index) => {
      const member = this.memberAt(statement, index, siblings, listPath, enclosingScopes);
      const previous = run[run.length - 1];
      if (!member) {
        flush();
        return;
      }
      if (previous && !sameTarget(previous.terminal, member.terminal)) {
        flush();
      }
      run.push(member);
    });
    flush();

    if (groups.length > 0) {
      Logger.debug('ConsecutiveLoopGroupDetector', `Found ${groups.length} loop group(s)`, groups.map(group => ({
        target: group.targetVariableName,
        loops: group.members.length
      })));
    }
    return groups;
  }

  private memberAt(
    statement: Statement,
    index: number,
    siblings: readonly Statement[],
    listPath: StatementPath,
    enclosingScopes: readonly ScopeInfo[]
  ): GroupMember | null {
    if (statement.kind !== 'forEach') return null;
    const candidate = LoopCandidateReader.read({ statement, path: [...listPath, index], siblings, index });
    if (!candidate || candidate.kind !== LoopKind.ENHANCED_FOR) return null;

    const verdict = this.analyzer.decide(candidate, enclosingScopes);
    if (verdict.decision !== ConversionDecision.CONVERTIBLE) return null;
    const terminal = verdict.model.terminal;
    if (!terminal || terminal.kind !== TerminalKind.COLLECT) return null;
    return { candidate, model: verdict.model, terminal };
  }
}

function sameTarget(left: CollectTerminal, right: CollectTerminal): boolean {
  return left.targetVariableName === right.targetVariableName && left.collectorKind === right.collectorKind;
}
