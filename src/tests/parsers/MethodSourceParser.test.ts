import { LoopConversionException } from '../../utils/LoopConversionException';
import { MethodSourceParser } from '../../utils/parsers/MethodSourceParser';

const method = {
  name: 'printAll',
  parameters: [{ name: 'items', typeName: 'List<String>' }],
  body: {
    kind: 'block',
    statements: [
      {
        kind: 'forEach',
        element: { name: 's', typeName: 'String' },
        iterable: { kind: 'name', identifier: 'items' },
        body: {
          kind: 'block',
          statements: [
            {
              kind: 'expression',
              expression: {
                kind: 'call',
                receiver: { kind: 'field', receiver: { kind: 'name', identifier: 'System' }, name: 'out' },
                method: 'println',
                args: [{ kind: 'name', identifier: 's' }]
              }
            }
          ]
        }
      }
    ]
  }
};

describe('MethodSourceParser', () => {
  it('accepts a single method', () => {
    expect(MethodSourceParser.parseMethod(method)).toEqual(method);
  });

  it('accepts the three file layouts', () => {
    expect(MethodSourceParser.parseFile(method)).toEqual([method]);
    expect(MethodSourceParser.parseFile([method, { ...method, name: 'again' }]).map(parsed => parsed.name)).toEqual(['printAll', 'again']);
    expect(MethodSourceParser.parseJson(JSON.stringify({ methods: [method] }))).toEqual([method]);
  });

  it('fills in loop updaters and catch clauses', () => {
    const parsed = MethodSourceParser.parseMethod({
      name: 'loops',
      body: {
        kind: 'block',
        statements: [
          { kind: 'for', condition: { kind: 'literal', literalKind: 'boolean', value: 'true' }, body: { kind: 'empty' } },
          { kind: 'try', block: { kind: 'block', statements: [] } }
        ]
      }
    });
    expect(parsed.body.statements).toEqual([
      { kind: 'for', condition: { kind: 'literal', literalKind: 'boolean', value: 'true' }, updaters: [], body: { kind: 'empty' } },
      { kind: 'try', block: { kind: 'block', statements: [] }, catches: [] }
    ]);
  });

  it('drops properties the syntax tree does not know', () => {
    const parsed = MethodSourceParser.parseMethod({
      name: 'extra',
      body: { kind: 'block', statements: [{ kind: 'return', position: 12 }] }
    });
    expect(parsed.body.statements).toEqual([{ kind: 'return' }]);
  });

  it('rejects unknown statement kinds', () => {
    const input = { name: 'broken', body: { kind: 'block', statements: [{ kind: 'goto', label: 'end' }] } };
    expect(() => MethodSourceParser.parseMethod(input)).toThrow(LoopConversionException);
    expect(() => MethodSourceParser.parseMethod(input)).toThrow(/^Invalid method source: /);
  });

  it('rejects a method without a body', () => {
    expect(() => MethodSourceParser.parseFile({ name: 'bodiless' })).toThrow(/Invalid method source/);
  });

  it('rejects malformed JSON', () => {
    expect(() => MethodSourceParser.parseJson('{ "name": ')).toThrow(/^Input is not valid JSON: /);
  });
});
