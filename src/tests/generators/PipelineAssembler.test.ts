import { NotConvertibleReason } from '../../types/analysis';
import { CollectorKind, MatchKind, OperationKind, ReducerKind, SourceKind, TerminalKind } from '../../types/model';
import { resolveConverterOptions } from '../../types/options';
import { AssemblyResult, isEmptyCollectionDeclaration, PipelineAssembler } from '../../utils/generators/PipelineAssembler';
import {
  call,
  declaration,
  methodRef,
  name,
  newInstance,
  numberLiteral,
  prefix
} from '../../utils/syntax/SyntaxFactory';
import { printLine } from '../helpers/methodSource';
import { modelOf } from './modelFixtures';

const notEmpty = { kind: OperationKind.FILTER, predicate: prefix('!', call(name('s'), 'isEmpty')) } as const;

function code(result: AssemblyResult): string {
  if (!result.ok) throw new Error(`Assembly failed: ${result.reason}`);
  return result.code;
}

describe('PipelineAssembler', () => {
  let assembler: PipelineAssembler;

  beforeEach(() => {
    assembler = new PipelineAssembler(resolveConverterOptions());
  });

  describe('forEach', () => {
    const forEach = { kind: TerminalKind.FOR_EACH, bodyStatements: [printLine('s')], ordered: false } as const;

    it('calls forEach on the collection when there are no stages', () => {
      const result = assembler.assemble(modelOf(forEach));
      expect(code(result)).toBe('items.forEach(s -> System.out.println(s));');
      expect(result.ok && result.requiredSymbols).toEqual([]);
    });

    it('streams when direct forEach is turned off', () => {
      const streaming = new PipelineAssembler(resolveConverterOptions({ preferDirectForEach: false }));
      expect(code(streaming.assemble(modelOf(forEach)))).toBe('items.stream().forEach(s -> System.out.println(s));');
    });

    it('streams arrays through Arrays.stream', () => {
      const result = assembler.assemble(modelOf(
        { kind: TerminalKind.FOR_EACH, bodyStatements: [printLine('v')], ordered: false },
        { source: name('values'), sourceKind: SourceKind.ARRAY, element: 'v', elementType: 'int' }
      ));
      expect(code(result)).toBe('Arrays.stream(values).forEach(v -> System.out.println(v));');
      expect(result.ok && result.requiredSymbols).toEqual(['java.util.Arrays']);
    });

    it('uses a block lambda for several statements', () => {
      const result = assembler.assemble(modelOf(
        {
          kind: TerminalKind.FOR_EACH,
          bodyStatements: [declaration('String', 't', call(name('s'), 'trim')), printLine('t')],
          ordered: true
        },
        { source: name('tags'), operations: [{ kind: OperationKind.FILTER, predicate: call(name('s'), 'isBlank') }] }
      ));
      expect(code(result)).toBe(
        'tags.stream().filter(s -> s.isBlank()).forEachOrdered(s -> {\n    String t = s.trim();\n    System.out.println(t);\n});'
      );
    });

    it('wraps iterables with StreamSupport', () => {
      const result = assembler.assemble(modelOf(
        { kind: TerminalKind.FOR_EACH, bodyStatements: [printLine('s')], ordered: true },
        { source: name('lines'), sourceKind: SourceKind.ITERABLE, operations: [notEmpty] }
      ));
      expect(code(result)).toBe(
        'StreamSupport.stream(lines.spliterator(), false).filter(s -> !s.isEmpty()).forEachOrdered(s -> System.out.println(s));'
      );
      expect(result.ok && result.requiredSymbols).toEqual(['java.util.stream.StreamSupport']);
    });
  });

  describe('collect', () => {
    const operations = [
      { kind: OperationKind.MAP, expression: call(name('s'), 'trim'), producedVariableName: 'trimmed', outputTypeName: 'String' }
    ] as const;

    it('folds the preceding empty declaration into the pipeline', () => {
      const preceding = declaration('List<String>', 'result', newInstance('ArrayList<>'));
      const result = assembler.assemble(modelOf(
        { kind: TerminalKind.COLLECT, collectorKind: CollectorKind.TO_LIST, targetVariableName: 'result', targetTypeName: 'List<String>' },
        { operations: [...operations] }
      ), preceding);
      expect(code(result)).toBe('List<String> result = items.stream().map(s -> s.trim()).collect(Collectors.toList());');
      expect(result.ok && result.mergedDeclaration).toBe(true);
      expect(result.ok && result.requiredSymbols).toEqual(['java.util.stream.Collectors']);
    });

    it('assigns when the preceding statement is not an empty declaration of the target', () => {
      const preceding = declaration('Set<String>', 'result', call(name('Set'), 'of'));
      const result = assembler.assemble(modelOf(
        { kind: TerminalKind.COLLECT, collectorKind: CollectorKind.TO_SET, targetVariableName: 'result', targetTypeName: 'Set<String>' },
        { operations: [...operations] }
      ), preceding);
      expect(code(result)).toBe('result = items.stream().map(s -> s.trim()).collect(Collectors.toSet());');
      expect(result.ok && result.mergedDeclaration).toBe(false);
    });

    it('collects concrete targets with toCollection', () => {
      const preceding = declaration('LinkedList<String>', 'queue', newInstance('LinkedList<>'));
      const result = assembler.assemble(modelOf(
        { kind: TerminalKind.COLLECT, collectorKind: CollectorKind.TO_LIST, targetVariableName: 'queue', targetTypeName: 'LinkedList<String>' }
      ), preceding);
      expect(code(result)).toBe('LinkedList<String> queue = items.stream().collect(Collectors.toCollection(LinkedList::new));');
    });

    it('uses toList() when configured', () => {
      const modern = new PipelineAssembler(resolveConverterOptions({ useStreamToList: true }));
      const result = modern.assemble(modelOf(
        { kind: TerminalKind.COLLECT, collectorKind: CollectorKind.TO_LIST, targetVariableName: 'result', targetTypeName: 'List<String>' }
      ));
      expect(code(result)).toBe('result = items.stream().toList();');
      expect(result.ok && result.requiredSymbols).toEqual([]);
    });
  });

  it('reduces into the accumulator', () => {
    const result = assembler.assemble(modelOf(
      {
        kind: TerminalKind.REDUCE,
        reducerKind: ReducerKind.SUM,
        accumulatorVariableName: 'total',
        accumulatorTypeName: 'int',
        identity: name('total'),
        accumulator: methodRef('Integer', 'sum')
      },
      { operations: [{ kind: OperationKind.MAP, expression: call(name('s'), 'length'), producedVariableName: 's' }] }
    ));
    expect(code(result)).toBe('total = items.stream().map(s -> s.length()).reduce(total, Integer::sum);');
  });

  it('emits match terminals as guarded returns', () => {
    const any = assembler.assemble(modelOf({ kind: TerminalKind.MATCH, matchKind: MatchKind.ANY, condition: call(name('s'), 'isEmpty') }));
    expect(code(any)).toBe('if (items.stream().anyMatch(s -> s.isEmpty())) {\n    return true;\n}');
    const none = assembler.assemble(modelOf({ kind: TerminalKind.MATCH, matchKind: MatchKind.NONE, condition: call(name('s'), 'isEmpty') }));
    expect(code(none)).toBe('if (!items.stream().noneMatch(s -> s.isEmpty())) {\n    return false;\n}');
    const all = assembler.assemble(modelOf({ kind: TerminalKind.MATCH, matchKind: MatchKind.ALL, condition: call(name('s'), 'isEmpty') }));
    expect(code(all)).toBe('if (!items.stream().allMatch(s -> s.isEmpty())) {\n    return false;\n}');
  });

  it('refuses models without a terminal or with out-of-scope names', () => {
    expect(assembler.assemble(modelOf(null))).toEqual({ ok: false, reason: NotConvertibleReason.NO_TERMINAL });
    const broken = modelOf(
      { kind: TerminalKind.FOR_EACH, bodyStatements: [printLine('s')], ordered: true },
      { operations: [{ kind: OperationKind.MAP, expression: numberLiteral(1), producedVariableName: 'one' }] }
    );
    expect(assembler.assemble(broken)).toEqual({
      ok: false,
      reason: NotConvertibleReason.SCOPE_VIOLATION,
      detail: 's not in scope at FOR_EACH'
    });
  });
});

describe('isEmptyCollectionDeclaration', () => {
  it('matches a no-argument collection creation of the target', () => {
    expect(isEmptyCollectionDeclaration(declaration('List<String>', 'out', newInstance('ArrayList<>')), 'out')).toBe(true);
    expect(isEmptyCollectionDeclaration(declaration('List<String>', 'out', newInstance('ArrayList<>', name('seed'))), 'out')).toBe(false);
    expect(isEmptyCollectionDeclaration(declaration('List<String>', 'out', newInstance('ArrayList<>')), 'other')).toBe(false);
    expect(isEmptyCollectionDeclaration(declaration('Builder', 'out', newInstance('Builder')), 'out')).toBe(false);
    expect(isEmptyCollectionDeclaration(undefined, 'out')).toBe(false);
  });
});
