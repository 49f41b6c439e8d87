import {
  CheckResult,
  ConversionDecision,
  ExtractionStatus,
  LoopCandidate,
  LoopKind,
  NotConvertibleReason,
  ScopeInfo
} from '../../types/analysis';
import { LoopModel, SourceKind, TerminalKind } from '../../types/model';
import { ConverterOptions, TargetFormat } from '../../types/options';
import { LoopModelExtractor } from '../extraction/LoopModelExtractor';
import { Logger } from '../Logger';
import { LoopConversionException } from '../LoopConversionException';
import { SyntaxPrinter } from '../syntax/SyntaxPrinter';
import { containsStatement } from '../syntax/SyntaxQueries';
import { TypeEnvironment } from '../syntax/TypeEnvironment';
import { LambdaSafetyAnalyzer } from './LambdaSafetyAnalyzer';
import { PipelineScopeValidator } from './PipelineScopeValidator';
import { SourceThreadSafetyAnalyzer } from './SourceThreadSafetyAnalyzer';

export type ConvertibilityVerdict =
  | { decision: ConversionDecision.CONVERTIBLE; model: LoopModel }
  | { decision: ConversionDecision.NOT_CONVERTIBLE; reason: NotConvertibleReason; detail?: string };

const DISALLOWED_STATEMENTS = new Set(['try', 'switch', 'synchronized']);

export class ConvertibilityAnalyzer {
  private readonly extractor: LoopModelExtractor;
  private readonly threadSafety: SourceThreadSafetyAnalyzer;

  constructor(private readonly environment: TypeEnvironment, private readonly options: ConverterOptions) {
    this.extractor = new LoopModelExtractor(environment);
    this.threadSafety = new SourceThreadSafetyAnalyzer(environment);
  }

  /**
   * Decides whether a loop can become a pipeline. Every failure, including an
   * unexpected error, ends in NOT_CONVERTIBLE.
   */
  decide(candidate: LoopCandidate, enclosingScopes: readonly ScopeInfo[]): ConvertibilityVerdict {
    try {
      return this.evaluate(candidate, enclosingScopes);
    } catch (error) {
      Logger.error('ConvertibilityAnalyzer', 'Loop analysis failed', error);
      const detail = error instanceof Error ? error.message : String(error);
      const reason = error instanceof LoopConversionException ? error.reason : NotConvertibleReason.INTERNAL_ERROR;
      return { decision: ConversionDecision.NOT_CONVERTIBLE, reason, detail };
    }
  }

  /**
   * Loop-to-loop rewrites keep the body as it is: enhanced for loops become
   * iterator loops and iterator loops become enhanced for loops.
   */
  decideFormatChange(candidate: LoopCandidate): ConvertibilityVerdict {
    const wanted = this.options.targetFormat === TargetFormat.ITERATOR_WHILE ? LoopKind.ENHANCED_FOR : LoopKind.ITERATOR_WHILE;
    if (this.options.targetFormat === TargetFormat.STREAM || candidate.kind !== wanted || !candidate.source || !candidate.element) {
      return { decision: ConversionDecision.NOT_CONVERTIBLE, reason: NotConvertibleReason.UNSUPPORTED_LOOP };
    }
    const resolved = this.environment.resolveSource(candidate.source);
    const element = candidate.element;
    return {
      decision: ConversionDecision.CONVERTIBLE,
      model: {
        source: {
          kind: resolved?.kind ?? SourceKind.ITERABLE,
          expression: candidate.source,
          expressionText: SyntaxPrinter.printExpression(candidate.source),
          elementTypeName: element.typeName !== 'var' ? element.typeName : resolved?.elementTypeName ?? 'var'
        },
        element,
        operations: [],
        terminal: { kind: TerminalKind.FOR_EACH, bodyStatements: candidate.body, ordered: false },
        metadata: LoopModelExtractor.metadataOf(candidate)
      }
    };
  }

  private evaluate(candidate: LoopCandidate, enclosingScopes: readonly ScopeInfo[]): ConvertibilityVerdict {
    if (candidate.kind === LoopKind.UNSUPPORTED || !candidate.source) {
      return this.reject({ ok: false, reason: NotConvertibleReason.UNSUPPORTED_LOOP });
    }

    const structural = this.checkStructure(candidate);
    if (!structural.ok) return this.reject(structural);

    if (candidate.kind === LoopKind.INDEXED_FOR && this.options.checkSourceThreadSafety && !this.threadSafety.isSafeToConvert(candidate.source)) {
      return this.reject({ ok: false, reason: NotConvertibleReason.SHARED_SOURCE, detail: SyntaxPrinter.printExpression(candidate.source) });
    }

    const extraction = this.extractor.extract(candidate);
    if (extraction.status === ExtractionStatus.ABORTED) {
      return this.reject({ ok: false, reason: extraction.reason });
    }
    const model = extraction.model;
    if (model.terminal === null) {
      return this.reject({ ok: false, reason: NotConvertibleReason.NO_TERMINAL });
    }

    for (const check of [
      LambdaSafetyAnalyzer.checkSideEffects(model),
      LambdaSafetyAnalyzer.checkCapture(model, enclosingScopes),
      PipelineScopeValidator.validate(model)
    ]) {
      if (!check.ok) return this.reject(check);
    }
    return { decision: ConversionDecision.CONVERTIBLE, model };
  }

  private checkStructure(candidate: LoopCandidate): CheckResult {
    const metadata = LoopModelExtractor.metadataOf(candidate);
    if (metadata.hasBreak) return { ok: false, reason: NotConvertibleReason.CONTAINS_BREAK };
    if (metadata.hasLabeledContinue) return { ok: false, reason: NotConvertibleReason.LABELED_CONTINUE };
    if (metadata.modifiesSource) return { ok: false, reason: NotConvertibleReason.MODIFIES_SOURCE };
    const disallowed = containsStatement(
      candidate.body,
      statement => DISALLOWED_STATEMENTS.has(statement.kind),
      { enterLoops: false, enterLambdas: false }
    );
    if (disallowed) return { ok: false, reason: NotConvertibleReason.DISALLOWED_STATEMENT };
    return { ok: true };
  }

  private reject(check: CheckResult): ConvertibilityVerdict {
    if (check.ok) {
      throw new LoopConversionException('Rejected a loop without a failed check');
    }
    Logger.debug('ConvertibilityAnalyzer', `Not convertible: ${check.reason}`, check.detail);
    return check.detail === undefined
      ? { decision: ConversionDecision.NOT_CONVERTIBLE, reason: check.reason }
      : { decision: ConversionDecision.NOT_CONVERTIBLE, reason: check.reason, detail: check.detail };
  }
}
