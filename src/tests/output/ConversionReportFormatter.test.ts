import { ConversionDecision, ConversionReport, EditAction, LoopKind, NotConvertibleReason } from '../../types/analysis';
import { ConversionReportFormatter, formatPath } from '../../utils/output/ConversionReportFormatter';

describe('ConversionReportFormatter', () => {
  let formatter: ConversionReportFormatter;

  beforeEach(() => {
    formatter = new ConversionReportFormatter();
  });

  it('lists decisions, edits and required symbols', () => {
    const report: ConversionReport = {
      methodName: 'process',
      decisions: [
        { path: [1], kind: LoopKind.ENHANCED_FOR, decision: ConversionDecision.CONVERTIBLE, groupId: 0 },
        {
          path: [0, 'body', 0],
          kind: LoopKind.INDEXED_FOR,
          decision: ConversionDecision.NOT_CONVERTIBLE,
          reason: NotConvertibleReason.SIDE_EFFECT,
          detail: 'last'
        },
        { path: [2], kind: LoopKind.ITERATOR_WHILE, decision: ConversionDecision.NOT_CONVERTIBLE, reason: NotConvertibleReason.EMPTY_BODY }
      ],
      edits: [
        { action: EditAction.REPLACE, path: [1], statements: [], code: 'a = 1;\nb = 2;' },
        { action: EditAction.REMOVE, path: [0] }
      ],
      requiredSymbols: ['java.util.stream.Collectors']
    };

    expect(formatter.format(report)).toBe([
      'Method: process',
      'Loops: 3 (1 convertible)',
      '  • 1 ENHANCED_FOR: CONVERTIBLE [group 0]',
      '  • 0/body/0 INDEXED_FOR: NOT_CONVERTIBLE (SIDE_EFFECT: last)',
      '  • 2 ITERATOR_WHILE: NOT_CONVERTIBLE (EMPTY_BODY)',
      'Edits:',
      '  REPLACE 1',
      '    a = 1;',
      '    b = 2;',
      '  REMOVE 0',
      'Required symbols:',
      '  • java.util.stream.Collectors'
    ].join('\n'));
  });

  it('says when there is nothing to change', () => {
    const report: ConversionReport = { methodName: 'empty', decisions: [], edits: [], requiredSymbols: [] };
    expect(formatter.format(report)).toBe('Method: empty\nLoops: 0 (0 convertible)\nNo edits.');
  });

  it('formats the method body path', () => {
    expect(formatPath([])).toBe('(body)');
    expect(formatPath([3, 'then', 0])).toBe('3/then/0');
  });
});
