import { ExtractionResult, ExtractionStatus, LoopCandidate, NotConvertibleReason } from '../../types/analysis';
import {
  ElementBinding,
  LoopMetadata,
  LoopModel,
  OperationKind,
  PipelineOperation,
  ReducerKind,
  ReduceTerminal,
  SourceDescriptor,
  Terminal,
  TerminalKind,
  UNUSED_PARAMETER_NAME
} from '../../types/model';
import { Expression, Statement } from '../../types/syntax';
import { CollectPatternDetector } from '../detectors/CollectPatternDetector';
import { FilterPatternDetector } from '../detectors/FilterPatternDetector';
import { MapPatternDetector } from '../detectors/MapPatternDetector';
import { MatchPatternDetector } from '../detectors/MatchPatternDetector';
import { ReduceDetection, ReducePatternDetector } from '../detectors/ReducePatternDetector';
import { Logger } from '../Logger';
import { ReducerStrategy } from '../reducers/ReducerStrategy';
import { name } from '../syntax/SyntaxFactory';
import { SyntaxPrinter } from '../syntax/SyntaxPrinter';
import { callsOn, containsStatement, declaredNames, simpleNameOf, stripParens } from '../syntax/SyntaxQueries';
import { TypeEnvironment } from '../syntax/TypeEnvironment';

const MODIFYING_METHODS = new Set([
  'add', 'addAll', 'remove', 'removeAll', 'removeIf', 'retainAll', 'clear', 'set', 'replaceAll', 'sort',
  'put', 'putAll', 'putIfAbsent', 'compute', 'computeIfAbsent', 'computeIfPresent', 'merge', 'replace'
]);

type BodyOutcome =
  | { status: ExtractionStatus.EXTRACTED; terminal: Terminal }
  | { status: ExtractionStatus.ABORTED; reason: NotConvertibleReason };

interface ExtractionState {
  currentVariable: string;
  readonly operations: PipelineOperation[];
  readonly loopLocals: ReadonlySet<string>;
  readonly nextStatement: Statement | undefined;
}

export class LoopModelExtractor {
  constructor(private readonly environment: TypeEnvironment) {}

  static metadataOf(candidate: LoopCandidate): LoopMetadata {
    const body = candidate.body;
    const sourceName = candidate.source ? simpleNameOf(candidate.source) : undefined;
    return {
      hasBreak: containsStatement(body, statement => statement.kind === 'break', { enterLambdas: false }),
      hasLabeledContinue: containsStatement(
        body,
        statement => statement.kind === 'continue' && statement.label !== undefined,
        { enterLambdas: false }
      ),
      modifiesSource: sourceName !== undefined && callsOn(body, sourceName).some(method => MODIFYING_METHODS.has(method))
    };
  }

  extract(candidate: LoopCandidate): ExtractionResult {
    const { source, element } = candidate;
    if (!source || !element) {
      return { status: ExtractionStatus.ABORTED, reason: NotConvertibleReason.UNSUPPORTED_LOOP };
    }
    const descriptor = this.describeSource(source, element);
    if (!descriptor) {
      return { status: ExtractionStatus.ABORTED, reason: NotConvertibleReason.UNSUPPORTED_SOURCE };
    }
    if (candidate.body.length === 0) {
      return { status: ExtractionStatus.ABORTED, reason: NotConvertibleReason.EMPTY_BODY };
    }
    if (containsStatement(candidate.body, statement => statement.kind === 'throw', { enterLambdas: false })) {
      return { status: ExtractionStatus.ABORTED, reason: NotConvertibleReason.CONTAINS_THROW };
    }

    const loopLocals = declaredNames(candidate.body);
    loopLocals.add(element.name);
    const state: ExtractionState = {
      currentVariable: element.name,
      operations: [],
      loopLocals,
      nextStatement: candidate.nextStatement
    };
    const outcome = this.classify(candidate.body, state);
    if (outcome.status === ExtractionStatus.ABORTED) {
      Logger.debug('LoopModelExtractor', `Extraction aborted: ${outcome.reason}`);
      return outcome;
    }

    const model: LoopModel = {
      source: descriptor,
      element,
      operations: state.operations,
      terminal: outcome.terminal,
      metadata: LoopModelExtractor.metadataOf(candidate)
    };
    Logger.debug('LoopModelExtractor', `Extracted ${state.operations.length} operation(s) ending in ${outcome.terminal.kind}`);
    return { status: ExtractionStatus.EXTRACTED, model };
  }

  private describeSource(source: Expression, element: ElementBinding): SourceDescriptor | undefined {
    const resolved = this.environment.resolveSource(source);
    if (!resolved) return undefined;
    const elementTypeName = element.typeName !== 'var' ? element.typeName : resolved.elementTypeName ?? 'var';
    return {
      kind: resolved.kind,
      expression: source,
      expressionText: SyntaxPrinter.printExpression(source),
      elementTypeName
    };
  }

  /** Walks the statements in order; the first rule that matches a statement wins. */
  private classify(statements: readonly Statement[], state: ExtractionState): BodyOutcome {
    for (let index = 0; index < statements.length; index++) {
      const statement = statements[index];
      if (statement === undefined) break;
      const isLast = index === statements.length - 1;

      const guard = FilterPatternDetector.detectGuardContinue(statement);
      if (guard) {
        state.operations.push({ kind: OperationKind.FILTER, predicate: guard });
        continue;
      }

      if (isLast) {
        const match = MatchPatternDetector.detect(statement, state.nextStatement);
        if (match) {
          return this.terminal({ kind: TerminalKind.MATCH, matchKind: match.matchKind, condition: match.condition });
        }
        const tail = FilterPatternDetector.detectGuardedTail(statement);
        if (tail) {
          state.operations.push({ kind: OperationKind.FILTER, predicate: tail.predicate });
          return this.classify(tail.body, state);
        }
      } else {
        const declared = MapPatternDetector.detectDeclaration(statement);
        if (declared) {
          const operation: PipelineOperation = declared.outputTypeName === undefined
            ? { kind: OperationKind.MAP, expression: declared.expression, producedVariableName: declared.producedVariableName }
            : {
                kind: OperationKind.MAP,
                expression: declared.expression,
                producedVariableName: declared.producedVariableName,
                outputTypeName: declared.outputTypeName
              };
          state.operations.push(operation);
          state.currentVariable = declared.producedVariableName;
          continue;
        }
        const reassigned = MapPatternDetector.detectReassignment(statement, state.currentVariable);
        if (reassigned) {
          state.operations.push({
            kind: OperationKind.MAP,
            expression: reassigned.expression,
            producedVariableName: reassigned.producedVariableName
          });
          continue;
        }
      }

      if (isLast) {
        const collect = CollectPatternDetector.detect(statement, state.currentVariable, state.loopLocals, this.environment);
        if (collect) {
          if (collect.mappedExpression) {
            state.operations.push({
              kind: OperationKind.MAP,
              expression: collect.mappedExpression,
              producedVariableName: state.currentVariable
            });
          }
          return this.terminal(collect.targetTypeName === undefined
            ? { kind: TerminalKind.COLLECT, collectorKind: collect.collectorKind, targetVariableName: collect.targetVariableName }
            : {
                kind: TerminalKind.COLLECT,
                collectorKind: collect.collectorKind,
                targetVariableName: collect.targetVariableName,
                targetTypeName: collect.targetTypeName
              });
        }
        const reduce = ReducePatternDetector.detect(statement, state.currentVariable, state.loopLocals, this.environment);
        if (reduce) {
          return this.terminal(this.reduceTerminal(reduce, state));
        }
      }

      return this.forEachTail(statements.slice(index), state);
    }
    return this.forEachTail([], state);
  }

  private reduceTerminal(reduce: ReduceDetection, state: ExtractionState): Terminal {
    const { reducerKind, accumulatorVariableName, accumulatorTypeName, operand } = reduce;
    if (ReducerStrategy.isCounting(reducerKind)) {
      state.operations.push({
        kind: OperationKind.MAP,
        expression: ReducerStrategy.unitLiteral(accumulatorTypeName),
        producedVariableName: UNUSED_PARAMETER_NAME
      });
    } else if (operand && !isCurrentVariable(operand, state.currentVariable)) {
      state.operations.push({ kind: OperationKind.MAP, expression: operand, producedVariableName: state.currentVariable });
    }

    const nullSafe = reducerKind === ReducerKind.STRING_CONCAT
      && this.environment.isNonNullAnnotated(accumulatorVariableName)
      && this.isNonNull(operand ?? name(state.currentVariable));
    const accumulator = ReducerStrategy.combiner(
      reducerKind,
      accumulatorTypeName === undefined ? { nullSafe } : { accumulatorTypeName, nullSafe }
    );
    const terminal: ReduceTerminal = {
      kind: TerminalKind.REDUCE,
      reducerKind,
      accumulatorVariableName,
      identity: name(accumulatorVariableName),
      accumulator
    };
    return accumulatorTypeName === undefined ? terminal : { ...terminal, accumulatorTypeName };
  }

  /** String operands that can never be null: literals, concatenations, `String.valueOf` and annotated names. */
  private isNonNull(expression: Expression): boolean {
    const stripped = stripParens(expression);
    switch (stripped.kind) {
      case 'literal':
        return stripped.literalKind === 'string';
      case 'binary':
        return stripped.operator === '+' && this.environment.typeOf(stripped) === 'String';
      case 'call':
        return stripped.method === 'valueOf' && stripped.receiver !== undefined && simpleNameOf(stripped.receiver) === 'String';
      case 'name':
        return this.environment.isNonNullAnnotated(stripped.identifier);
      default:
        return false;
    }
  }

  /**
   * The remaining statements become the forEach body, unless they would not
   * compile inside a lambda. Encounter order is kept once any stage precedes it.
   */
  private forEachTail(statements: readonly Statement[], state: ExtractionState): BodyOutcome {
    if (containsStatement(statements, statement => statement.kind === 'return', { enterLambdas: false })) {
      return { status: ExtractionStatus.ABORTED, reason: NotConvertibleReason.CONTAINS_RETURN };
    }
    if (containsStatement(statements, statement => statement.kind === 'continue', { enterLambdas: false, enterLoops: false })) {
      return { status: ExtractionStatus.ABORTED, reason: NotConvertibleReason.UNLABELED_CONTINUE };
    }
    return this.terminal({ kind: TerminalKind.FOR_EACH, bodyStatements: [...statements], ordered: state.operations.length > 0 });
  }

  private terminal(terminal: Terminal): BodyOutcome {
    return { status: ExtractionStatus.EXTRACTED, terminal };
  }
}

function isCurrentVariable(expression: Expression, currentVariable: string): boolean {
  const stripped = stripParens(expression);
  return stripped.kind === 'name' && stripped.identifier === currentVariable;
}

