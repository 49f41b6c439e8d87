import { ConversionDecision, NotConvertibleReason, ScopeInfo, ThreadSafetyLevel } from '../../types/analysis';
import { LoopModel, OperationKind, SourceKind, TerminalKind } from '../../types/model';
import { resolveConverterOptions, TargetFormat } from '../../types/options';
import { MethodSource, Statement } from '../../types/syntax';
import { ConvertibilityAnalyzer, ConvertibilityVerdict } from '../../utils/analyzers/ConvertibilityAnalyzer';
import { LoopModelExtractor } from '../../utils/extraction/LoopModelExtractor';
import { LambdaSafetyAnalyzer } from '../../utils/analyzers/LambdaSafetyAnalyzer';
import { LoopScopeScanner } from '../../utils/analyzers/LoopScopeScanner';
import { PipelineScopeValidator } from '../../utils/analyzers/PipelineScopeValidator';
import { SourceThreadSafetyAnalyzer } from '../../utils/analyzers/SourceThreadSafetyAnalyzer';
import {
  assign,
  binary,
  block,
  breakStatement,
  call,
  continueStatement,
  declaration,
  expressionStatement,
  field,
  forEachLoop,
  forLoop,
  ifStatement,
  labeled,
  name,
  newInstance,
  nullLiteral,
  numberLiteral,
  postfix
} from '../../utils/syntax/SyntaxFactory';
import { TypeEnvironment } from '../../utils/syntax/TypeEnvironment';
import { candidateAt, methodOf, parameter, printLine } from '../helpers/methodSource';

const parameters = [parameter('items', 'List<String>')];

function loopOver(source: string, ...body: Statement[]): Statement {
  return forEachLoop({ name: 's', typeName: 'String' }, name(source), block(...body));
}

function decide(method: MethodSource, index: number, options = resolveConverterOptions()): ConvertibilityVerdict {
  const analyzer = new ConvertibilityAnalyzer(new TypeEnvironment(method), options);
  return analyzer.decide(candidateAt(method, index), [LoopScopeScanner.scanMethod(method)]);
}

function modelOf(operations: LoopModel['operations'], terminal: LoopModel['terminal']): LoopModel {
  return {
    source: { kind: SourceKind.COLLECTION, expression: name('items'), expressionText: 'items', elementTypeName: 'String' },
    element: { name: 's', typeName: 'String', isFinal: false },
    operations,
    terminal,
    metadata: { hasBreak: false, hasLabeledContinue: false, modifiesSource: false }
  };
}

describe('ConvertibilityAnalyzer', () => {
  it('accepts a plain forEach loop', () => {
    const verdict = decide(methodOf([loopOver('items', printLine('s'))], { parameters }), 0);
    expect(verdict.decision).toBe(ConversionDecision.CONVERTIBLE);
  });

  it('rejects loops that break', () => {
    const method = methodOf([loopOver('items', ifStatement(call(name('s'), 'isEmpty'), breakStatement()), printLine('s'))], { parameters });
    expect(decide(method, 0)).toEqual({ decision: ConversionDecision.NOT_CONVERTIBLE, reason: NotConvertibleReason.CONTAINS_BREAK });
  });

  it('rejects a labelled loop continued from an inner loop', () => {
    const inner = forEachLoop({ name: 'c', typeName: 'String' }, name('tags'), block(
      ifStatement(call(name('c'), 'isEmpty'), continueStatement('outer'))
    ));
    const method = methodOf([labeled('outer', loopOver('items', inner, printLine('s')))], {
      parameters: [...parameters, parameter('tags', 'Set<String>')]
    });

    expect(LoopModelExtractor.metadataOf(candidateAt(method, 0)).hasLabeledContinue).toBe(true);
    expect(decide(method, 0)).toEqual({
      decision: ConversionDecision.NOT_CONVERTIBLE,
      reason: NotConvertibleReason.LABELED_CONTINUE
    });
  });

  it('rejects loops that modify their source', () => {
    const method = methodOf([loopOver('items', expressionStatement(call(name('items'), 'add', name('s'))))], { parameters });
    expect(decide(method, 0)).toEqual({ decision: ConversionDecision.NOT_CONVERTIBLE, reason: NotConvertibleReason.MODIFIES_SOURCE });
  });

  it('rejects try blocks in the body', () => {
    const guarded: Statement = { kind: 'try', block: block(printLine('s')), catches: [] };
    const method = methodOf([loopOver('items', guarded)], { parameters });
    expect(decide(method, 0)).toEqual({ decision: ConversionDecision.NOT_CONVERTIBLE, reason: NotConvertibleReason.DISALLOWED_STATEMENT });
  });

  it('reports writes to outer variables as side effects', () => {
    const method = methodOf([
      declaration('String', 'last', nullLiteral()),
      loopOver('items', printLine('s'), expressionStatement(assign(name('last'), name('s'))))
    ], { parameters });
    expect(decide(method, 1)).toEqual({
      decision: ConversionDecision.NOT_CONVERTIBLE,
      reason: NotConvertibleReason.SIDE_EFFECT,
      detail: 'last'
    });
  });

  it('reports captured variables that are reassigned', () => {
    const method = methodOf([
      declaration('int', 'offset', numberLiteral(0)),
      expressionStatement(assign(name('offset'), numberLiteral(5))),
      loopOver('items', expressionStatement(call(field(name('System'), 'out'), 'println', binary(call(name('s'), 'length'), '+', name('offset')))))
    ], { parameters });
    expect(decide(method, 2)).toEqual({
      decision: ConversionDecision.NOT_CONVERTIBLE,
      reason: NotConvertibleReason.CAPTURE_VIOLATION,
      detail: 'offset'
    });
  });

  describe('index loops', () => {
    const indexLoop = (source: string) => forLoop(
      declaration('int', 'i', numberLiteral(0)),
      binary(name('i'), '<', call(name(source), 'size')),
      [postfix('++', name('i'))],
      block(declaration('String', 'n', call(name(source), 'get', name('i'))), printLine('n'))
    );

    it('converts index loops over parameters', () => {
      expect(decide(methodOf([indexLoop('items')], { parameters }), 0).decision).toBe(ConversionDecision.CONVERTIBLE);
    });

    it('rejects index loops over mutable fields', () => {
      const method = methodOf([indexLoop('names')], { fields: [{ name: 'names', typeName: 'List<String>' }] });
      expect(decide(method, 0)).toEqual({
        decision: ConversionDecision.NOT_CONVERTIBLE,
        reason: NotConvertibleReason.SHARED_SOURCE,
        detail: 'names'
      });
    });

    it('skips the source check when it is disabled', () => {
      const method = methodOf([indexLoop('names')], { fields: [{ name: 'names', typeName: 'List<String>' }] });
      const options = resolveConverterOptions({ checkSourceThreadSafety: false });
      expect(decide(method, 0, options).decision).toBe(ConversionDecision.CONVERTIBLE);
    });
  });

  describe('decideFormatChange', () => {
    it('builds a body-preserving model for the iterator target', () => {
      const method = methodOf([loopOver('items', printLine('s'))], { parameters });
      const analyzer = new ConvertibilityAnalyzer(new TypeEnvironment(method), resolveConverterOptions({ targetFormat: TargetFormat.ITERATOR_WHILE }));
      const verdict = analyzer.decideFormatChange(candidateAt(method, 0));
      expect(verdict.decision).toBe(ConversionDecision.CONVERTIBLE);
      if (verdict.decision === ConversionDecision.CONVERTIBLE) {
        expect(verdict.model.terminal).toEqual({ kind: TerminalKind.FOR_EACH, bodyStatements: [printLine('s')], ordered: false });
      }
    });

    it('refuses loops already in the target form', () => {
      const method = methodOf([loopOver('items', printLine('s'))], { parameters });
      const analyzer = new ConvertibilityAnalyzer(new TypeEnvironment(method), resolveConverterOptions({ targetFormat: TargetFormat.ENHANCED_FOR }));
      expect(analyzer.decideFormatChange(candidateAt(method, 0))).toEqual({
        decision: ConversionDecision.NOT_CONVERTIBLE,
        reason: NotConvertibleReason.UNSUPPORTED_LOOP
      });
    });
  });
});

describe('LambdaSafetyAnalyzer', () => {
  const scope = (declared: string[], modified: string[]): ScopeInfo => ({
    declaredVariables: new Set(declared),
    modifiedVariables: new Set(modified)
  });

  it('excludes loop locals from the captured names', () => {
    const model = modelOf(
      [{ kind: OperationKind.MAP, expression: binary(name('s'), '+', name('suffix')), producedVariableName: 'labelled' }],
      { kind: TerminalKind.FOR_EACH, bodyStatements: [printLine('labelled')], ordered: true }
    );
    expect([...LambdaSafetyAnalyzer.capturedNames(model)].sort()).toEqual(['System', 'suffix']);
  });

  it('only flags captures modified in a scope that declares them', () => {
    const model = modelOf([{ kind: OperationKind.FILTER, predicate: binary(name('s'), '!=', name('limit')) }], null);
    expect(LambdaSafetyAnalyzer.checkCapture(model, [scope(['other'], ['limit'])])).toEqual({ ok: true });
    expect(LambdaSafetyAnalyzer.checkCapture(model, [scope(['limit'], ['limit'])])).toEqual({
      ok: false,
      reason: NotConvertibleReason.CAPTURE_VIOLATION,
      detail: 'limit'
    });
  });

  it('allows writes to locals declared in the forEach body', () => {
    const model = modelOf([], {
      kind: TerminalKind.FOR_EACH,
      bodyStatements: [declaration('int', 'size', numberLiteral(0)), expressionStatement(assign(name('size'), call(name('s'), 'length')))],
      ordered: false
    });
    expect(LambdaSafetyAnalyzer.checkSideEffects(model)).toEqual({ ok: true });
  });
});

describe('PipelineScopeValidator', () => {
  it('accepts stages that read the current variable', () => {
    const model = modelOf(
      [
        { kind: OperationKind.MAP, expression: call(name('s'), 'trim'), producedVariableName: 'trimmed' },
        { kind: OperationKind.FILTER, predicate: call(name('trimmed'), 'isEmpty') }
      ],
      { kind: TerminalKind.FOR_EACH, bodyStatements: [printLine('trimmed')], ordered: true }
    );
    expect(PipelineScopeValidator.validate(model)).toEqual({ ok: true });
  });

  it('names the stage that reads a name mapped away', () => {
    const model = modelOf(
      [
        { kind: OperationKind.MAP, expression: call(name('s'), 'trim'), producedVariableName: 'trimmed' },
        { kind: OperationKind.FILTER, predicate: binary(name('s'), '!=', name('trimmed')) }
      ],
      null
    );
    expect(PipelineScopeValidator.validate(model)).toEqual({
      ok: false,
      reason: NotConvertibleReason.SCOPE_VIOLATION,
      detail: 's not in scope at FILTER #2'
    });
  });

  it('checks the forEach body against the last produced name', () => {
    const model = modelOf(
      [{ kind: OperationKind.MAP, expression: call(name('s'), 'trim'), producedVariableName: 'trimmed' }],
      { kind: TerminalKind.FOR_EACH, bodyStatements: [printLine('s')], ordered: true }
    );
    expect(PipelineScopeValidator.validate(model)).toEqual({
      ok: false,
      reason: NotConvertibleReason.SCOPE_VIOLATION,
      detail: 's not in scope at FOR_EACH'
    });
  });
});

describe('SourceThreadSafetyAnalyzer', () => {
  const method = methodOf([declaration('List<String>', 'local', newInstance('ArrayList<>'))], {
    parameters,
    fields: [
      { name: 'shared', typeName: 'List<String>' },
      { name: 'queue', typeName: 'ConcurrentLinkedQueue<String>' },
      { name: 'fixed', typeName: 'List<String>', isFinal: true, initializer: call(name('List'), 'of', name('a')) },
      { name: 'guarded', typeName: 'List<String>', isFinal: true, initializer: call(name('Collections'), 'synchronizedList', name('raw')) }
    ]
  });
  const analyzer = new SourceThreadSafetyAnalyzer(new TypeEnvironment(method));

  it('classifies where a source comes from', () => {
    expect(analyzer.classify(name('local'))).toBe(ThreadSafetyLevel.LOCALLY_CREATED);
    expect(analyzer.classify(name('items'))).toBe(ThreadSafetyLevel.LOCALLY_CREATED);
    expect(analyzer.classify(name('queue'))).toBe(ThreadSafetyLevel.CONCURRENT_SAFE);
    expect(analyzer.classify(name('fixed'))).toBe(ThreadSafetyLevel.IMMUTABLE);
    expect(analyzer.classify(field({ kind: 'this' }, 'guarded'))).toBe(ThreadSafetyLevel.SYNCHRONIZED_WRAPPER);
    expect(analyzer.classify(call(name('Collections'), 'unmodifiableList', name('local')))).toBe(ThreadSafetyLevel.IMMUTABLE);
  });

  it('treats mutable fields as shared', () => {
    expect(analyzer.classify(name('shared'))).toBe(ThreadSafetyLevel.POTENTIALLY_SHARED);
    expect(analyzer.isSafeToConvert(name('shared'))).toBe(false);
    expect(analyzer.isSafeToConvert(newInstance('ArrayList<>', name('shared')))).toBe(true);
  });
});
