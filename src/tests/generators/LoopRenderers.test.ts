import { CollectorKind, MatchKind, OperationKind, PipelineOperation, ReducerKind, SourceKind, TerminalKind } from '../../types/model';
import { EnhancedForRenderer } from '../../utils/generators/EnhancedForRenderer';
import { IteratorLoopRenderer } from '../../utils/generators/IteratorLoopRenderer';
import { LoopBodyBuilder } from '../../utils/generators/LoopBodyBuilder';
import { call, methodRef, name, numberLiteral, prefix } from '../../utils/syntax/SyntaxFactory';
import { SyntaxPrinter } from '../../utils/syntax/SyntaxPrinter';
import { printLine } from '../helpers/methodSource';
import { modelOf } from './modelFixtures';

const upperCaseCollect = modelOf(
  { kind: TerminalKind.COLLECT, collectorKind: CollectorKind.TO_LIST, targetVariableName: 'result', targetTypeName: 'List<String>' },
  {
    operations: [
      { kind: OperationKind.FILTER, predicate: prefix('!', call(name('s'), 'isEmpty')) },
      { kind: OperationKind.MAP, expression: call(name('s'), 'toUpperCase'), producedVariableName: 'upper', outputTypeName: 'String' }
    ]
  }
);

describe('LoopBodyBuilder', () => {
  it('turns filters into continue guards and maps into declarations', () => {
    expect(SyntaxPrinter.printStatements(LoopBodyBuilder.build(upperCaseCollect))).toBe([
      'if (s.isEmpty()) {',
      '    continue;',
      '}',
      'String upper = s.toUpperCase();',
      'result.add(upper);'
    ].join('\n'));
  });

  it('folds the trailing map into the collected value', () => {
    const model = modelOf(
      { kind: TerminalKind.COLLECT, collectorKind: CollectorKind.TO_SET, targetVariableName: 'seen' },
      { operations: [{ kind: OperationKind.MAP, expression: call(name('s'), 'trim'), producedVariableName: 's' }] }
    );
    expect(SyntaxPrinter.printStatements(LoopBodyBuilder.build(model))).toBe('seen.add(s.trim());');
  });

  it('reassigns the element for maps that keep its name', () => {
    const model = modelOf(
      { kind: TerminalKind.FOR_EACH, bodyStatements: [printLine('s')], ordered: true },
      { operations: [{ kind: OperationKind.MAP, expression: call(name('s'), 'trim'), producedVariableName: 's' }] }
    );
    expect(SyntaxPrinter.printStatements(LoopBodyBuilder.build(model))).toBe('s = s.trim();\nSystem.out.println(s);');
  });

  it('writes reducers back as updates', () => {
    const lengths: PipelineOperation[] = [{ kind: OperationKind.MAP, expression: call(name('s'), 'length'), producedVariableName: 's' }];
    const units: PipelineOperation[] = [{ kind: OperationKind.MAP, expression: numberLiteral(1), producedVariableName: '_item' }];
    const reduce = (reducerKind: ReducerKind, operations: PipelineOperation[] = lengths) =>
      SyntaxPrinter.printStatements(LoopBodyBuilder.build(modelOf(
        { kind: TerminalKind.REDUCE, reducerKind, accumulatorVariableName: 'acc', identity: name('acc'), accumulator: methodRef('Integer', 'sum') },
        { operations }
      )));
    expect(reduce(ReducerKind.SUM)).toBe('acc += s.length();');
    expect(reduce(ReducerKind.DIFFERENCE)).toBe('acc -= s.length();');
    expect(reduce(ReducerKind.PRODUCT)).toBe('acc *= s.length();');
    expect(reduce(ReducerKind.MAX)).toBe('acc = Math.max(acc, s.length());');
    expect(reduce(ReducerKind.INCREMENT, units)).toBe('acc++;');
    expect(reduce(ReducerKind.DECREMENT, units)).toBe('acc--;');
  });

  it('writes match terminals as early returns', () => {
    const match = (matchKind: MatchKind) => SyntaxPrinter.printStatements(LoopBodyBuilder.build(
      modelOf({ kind: TerminalKind.MATCH, matchKind, condition: call(name('s'), 'isEmpty') })
    ));
    expect(match(MatchKind.ANY)).toBe('if (s.isEmpty()) {\n    return true;\n}');
    expect(match(MatchKind.NONE)).toBe('if (s.isEmpty()) {\n    return false;\n}');
    expect(match(MatchKind.ALL)).toBe('if (!s.isEmpty()) {\n    return false;\n}');
  });
});

describe('IteratorLoopRenderer', () => {
  it('renders an iterator declaration and a while loop', () => {
    const rendering = IteratorLoopRenderer.render(upperCaseCollect);
    expect(SyntaxPrinter.printStatements(rendering.statements)).toBe([
      'Iterator<String> it = items.iterator();',
      'while (it.hasNext()) {',
      '    String s = it.next();',
      '    if (s.isEmpty()) {',
      '        continue;',
      '    }',
      '    String upper = s.toUpperCase();',
      '    result.add(upper);',
      '}'
    ].join('\n'));
    expect(rendering.requiredSymbols).toEqual(['java.util.Iterator']);
  });

  it('avoids names that are already taken', () => {
    const rendering = IteratorLoopRenderer.render(upperCaseCollect, {
      iteratorVariableName: 'cursor',
      reservedNames: new Set(['cursor', 'cursor2'])
    });
    expect(SyntaxPrinter.printStatement(rendering.statements[0] ?? { kind: 'empty' })).toBe('Iterator<String> cursor3 = items.iterator();');
  });

  it('iterates arrays through a boxed iterator and keeps labels', () => {
    const rendering = IteratorLoopRenderer.render(
      modelOf(
        { kind: TerminalKind.FOR_EACH, bodyStatements: [printLine('v')], ordered: false },
        { source: name('values'), sourceKind: SourceKind.ARRAY, element: 'v', elementType: 'int' }
      ),
      { label: 'scan' }
    );
    expect(SyntaxPrinter.printStatements(rendering.statements)).toBe([
      'Iterator<Integer> it = Arrays.stream(values).iterator();',
      'scan: while (it.hasNext()) {',
      '    int v = it.next();',
      '    System.out.println(v);',
      '}'
    ].join('\n'));
    expect(rendering.requiredSymbols).toEqual(['java.util.Iterator', 'java.util.Arrays']);
  });
});

describe('EnhancedForRenderer', () => {
  it('renders the element in the loop header', () => {
    const rendering = EnhancedForRenderer.render(modelOf(
      { kind: TerminalKind.FOR_EACH, bodyStatements: [printLine('s')], ordered: false },
      { isFinal: true }
    ));
    expect(SyntaxPrinter.printStatements(rendering.statements)).toBe('for (final String s : items) {\n    System.out.println(s);\n}');
    expect(rendering.requiredSymbols).toEqual([]);
  });

  it('keeps the label', () => {
    const rendering = EnhancedForRenderer.render(upperCaseCollect, { label: 'outer' });
    expect(SyntaxPrinter.printStatements(rendering.statements)).toBe([
      'outer: for (String s : items) {',
      '    if (s.isEmpty()) {',
      '        continue;',
      '    }',
      '    String upper = s.toUpperCase();',
      '    result.add(upper);',
      '}'
    ].join('\n'));
  });
});
