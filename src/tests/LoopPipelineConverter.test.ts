import { ConversionDecision, EditAction, LoopKind, NotConvertibleReason, RewriteEdit } from '../types/analysis';
import { TargetFormat } from '../types/options';
import { Statement } from '../types/syntax';
import { LoopPipelineConverter } from '../utils/LoopPipelineConverter';
import { applyRewriteEdits } from '../utils/output/EditApplier';
import {
  assign,
  block,
  booleanLiteral,
  breakStatement,
  call,
  continueStatement,
  declaration,
  expressionStatement,
  field,
  forEachLoop,
  ifStatement,
  lambda,
  name,
  newInstance,
  numberLiteral,
  returnStatement,
  whileLoop
} from '../utils/syntax/SyntaxFactory';
import { SyntaxPrinter } from '../utils/syntax/SyntaxPrinter';
import { methodOf, parameter, printLine } from './helpers/methodSource';

const parameters = [
  parameter('items', 'List<String>'),
  parameter('names', 'List<String>'),
  parameter('orders', 'List<Order>'),
  parameter('rows', 'List<List<String>>'),
  parameter('first', 'List<String>'),
  parameter('second', 'List<String>')
];

function codeOf(edit: RewriteEdit | undefined): string | undefined {
  return edit?.action === EditAction.REPLACE ? edit.code : undefined;
}

function actionsOf(edits: readonly RewriteEdit[]): string[] {
  return edits.map(edit => `${edit.action} ${edit.path.join('/')}`);
}

describe('LoopPipelineConverter', () => {
  let converter: LoopPipelineConverter;

  beforeEach(() => {
    converter = new LoopPipelineConverter();
  });

  it('folds the empty collection declaration into a collect pipeline', () => {
    const method = methodOf([
      declaration('List<String>', 'result', newInstance('ArrayList<>')),
      forEachLoop({ name: 'name', typeName: 'String' }, name('names'), block(
        ifStatement(call(name('name'), 'isEmpty'), continueStatement()),
        expressionStatement(call(name('result'), 'add', call(name('name'), 'toUpperCase')))
      ))
    ], { parameters });

    const report = converter.convert(method);
    expect(report.methodName).toBe('process');
    expect(actionsOf(report.edits)).toEqual(['REPLACE 1', 'REMOVE 0']);
    expect(codeOf(report.edits[0])).toBe(
      'List<String> result = names.stream().filter(name -> !name.isEmpty()).map(name -> name.toUpperCase()).collect(Collectors.toList());'
    );
    expect(report.requiredSymbols).toEqual(['java.util.stream.Collectors']);
    expect(report.decisions).toHaveLength(1);
    expect(report.decisions[0]?.decision).toBe(ConversionDecision.CONVERTIBLE);
    expect(report.decisions[0]?.kind).toBe(LoopKind.ENHANCED_FOR);
  });

  it('turns an accumulating loop into a reduction', () => {
    const method = methodOf([
      declaration('int', 'total', numberLiteral(0)),
      forEachLoop({ name: 'order', typeName: 'Order' }, name('orders'), block(
        expressionStatement(assign(name('total'), call(name('order'), 'getAmount'), '+='))
      ))
    ], { parameters });

    const report = converter.convert(method);
    expect(actionsOf(report.edits)).toEqual(['REPLACE 1']);
    expect(codeOf(report.edits[0])).toBe('total = orders.stream().map(order -> order.getAmount()).reduce(total, Integer::sum);');
    expect(report.requiredSymbols).toEqual([]);
  });

  it('turns an early return into anyMatch', () => {
    const method = methodOf([
      forEachLoop({ name: 's', typeName: 'String' }, name('items'), block(
        ifStatement(call(name('s'), 'isEmpty'), block(returnStatement(booleanLiteral(true))))
      )),
      returnStatement(booleanLiteral(false))
    ], { parameters });

    const report = converter.convert(method);
    expect(codeOf(report.edits[0])).toBe([
      'if (items.stream().anyMatch(s -> s.isEmpty())) {',
      '    return true;',
      '}'
    ].join('\n'));
  });

  it('converts the inner loop and skips the outer one', () => {
    const method = methodOf([
      forEachLoop({ name: 'row', typeName: 'List<String>' }, name('rows'), block(
        forEachLoop({ name: 'cell', typeName: 'String' }, name('row'), block(printLine('cell')))
      ))
    ], { parameters });

    const report = converter.convert(method);
    expect(report.decisions.map(decision => [decision.path.join('/'), decision.decision])).toEqual([
      ['0', ConversionDecision.SKIPPED_INNER_CONVERTED],
      ['0/body/0', ConversionDecision.CONVERTIBLE]
    ]);
    expect(actionsOf(report.edits)).toEqual(['REPLACE 0/body/0']);
    expect(codeOf(report.edits[0])).toBe('row.forEach(cell -> System.out.println(cell));');
  });

  it('reports loops it cannot convert', () => {
    const method = methodOf([
      forEachLoop({ name: 's', typeName: 'String' }, name('items'), block(
        ifStatement(call(name('s'), 'isEmpty'), breakStatement()),
        printLine('s')
      ))
    ], { parameters });

    const report = converter.convert(method);
    expect(report.edits).toHaveLength(0);
    expect(report.decisions[0]?.decision).toBe(ConversionDecision.NOT_CONVERTIBLE);
    expect(report.decisions[0]?.reason).toBe(NotConvertibleReason.CONTAINS_BREAK);
    expect(report.decisions[0]?.model).toBeUndefined();
  });

  it('merges adjacent loops into one concatenated stream', () => {
    const appendLoop = (element: string, source: string): Statement =>
      forEachLoop({ name: element, typeName: 'String' }, name(source), block(expressionStatement(call(name('all'), 'add', name(element)))));
    const method = methodOf([
      declaration('List<String>', 'all', newInstance('ArrayList<>')),
      appendLoop('a', 'first'),
      appendLoop('b', 'second')
    ], { parameters });

    const report = converter.convert(method);
    expect(actionsOf(report.edits)).toEqual(['REPLACE 1', 'REMOVE 2', 'REMOVE 0']);
    expect(codeOf(report.edits[0])).toBe(
      'List<String> all = Stream.concat(first.stream(), second.stream()).collect(Collectors.toList());'
    );
    expect(report.requiredSymbols).toEqual(['java.util.stream.Collectors', 'java.util.stream.Stream']);
    expect(report.decisions.map(decision => decision.groupId)).toEqual([0, 0]);

    const rewritten = applyRewriteEdits(method.body, report.edits);
    expect(SyntaxPrinter.printStatements(rewritten.statements)).toBe(
      'List<String> all = Stream.concat(first.stream(), second.stream()).collect(Collectors.toList());'
    );
  });

  it('rewrites an enhanced for loop as an iterator loop', () => {
    const method = methodOf([
      forEachLoop({ name: 's', typeName: 'String' }, name('items'), block(printLine('s')))
    ], { parameters });

    const report = new LoopPipelineConverter({ targetFormat: TargetFormat.ITERATOR_WHILE }).convert(method);
    expect(actionsOf(report.edits)).toEqual(['REPLACE 0']);
    expect(codeOf(report.edits[0])).toBe([
      'Iterator<String> it = items.iterator();',
      'while (it.hasNext()) {',
      '    String s = it.next();',
      '    System.out.println(s);',
      '}'
    ].join('\n'));
    expect(report.requiredSymbols).toEqual(['java.util.Iterator']);
  });

  it('rewrites an iterator loop as an enhanced for loop', () => {
    const method = methodOf([
      declaration('Iterator<String>', 'it', call(name('items'), 'iterator')),
      whileLoop(call(name('it'), 'hasNext'), block(
        declaration('String', 's', call(name('it'), 'next')),
        printLine('s')
      ))
    ], { parameters });

    const report = new LoopPipelineConverter({ targetFormat: TargetFormat.ENHANCED_FOR }).convert(method);
    expect(actionsOf(report.edits)).toEqual(['REPLACE 1', 'REMOVE 0']);
    expect(codeOf(report.edits[0])).toBe([
      'for (String s : items) {',
      '    System.out.println(s);',
      '}'
    ].join('\n'));
  });

  it('rewrites pipeline statements as loops and leaves the enclosing loop alone', () => {
    const method = methodOf([
      forEachLoop({ name: 'row', typeName: 'List<String>' }, name('rows'), block(
        expressionStatement(call(name('row'), 'forEach', lambda(['cell'], call(field(name('System'), 'out'), 'println', name('cell')))))
      ))
    ], { parameters });

    const report = new LoopPipelineConverter({ targetFormat: TargetFormat.ENHANCED_FOR }).convert(method);
    expect(actionsOf(report.edits)).toEqual(['REPLACE 0/body/0']);
    expect(codeOf(report.edits[0])).toBe([
      'for (String cell : row) {',
      '    System.out.println(cell);',
      '}'
    ].join('\n'));
    expect(report.decisions.map(decision => decision.decision)).toEqual([ConversionDecision.SKIPPED_INNER_CONVERTED]);
  });
});
