import { z } from 'zod';
import { BlockStatement, Expression, MethodSource, Statement } from '../../types/syntax';
import { Logger } from '../Logger';
import { LoopConversionException } from '../LoopConversionException';

const typeTag = z.string().optional();

const expressionSchema: z.ZodType<Expression, z.ZodTypeDef, unknown> = z.lazy(() => z.union([
  z.object({ kind: z.literal('name'), identifier: z.string(), type: typeTag }),
  z.object({
    kind: z.literal('literal'),
    literalKind: z.enum(['number', 'string', 'char', 'boolean', 'null']),
    value: z.string(),
    type: typeTag
  }),
  z.object({ kind: z.literal('this'), type: typeTag }),
  z.object({ kind: z.literal('field'), receiver: expressionSchema, name: z.string(), type: typeTag }),
  z.object({
    kind: z.literal('call'),
    receiver: expressionSchema.optional(),
    method: z.string(),
    args: z.array(expressionSchema),
    type: typeTag
  }),
  z.object({ kind: z.literal('new'), typeName: z.string(), args: z.array(expressionSchema), type: typeTag }),
  z.object({
    kind: z.literal('unary'),
    operator: z.enum(['!', '-', '+', '~', '++', '--']),
    operand: expressionSchema,
    type: typeTag
  }),
  z.object({ kind: z.literal('postfix'), operator: z.enum(['++', '--']), operand: expressionSchema, type: typeTag }),
  z.object({
    kind: z.literal('binary'),
    operator: z.string(),
    left: expressionSchema,
    right: expressionSchema,
    type: typeTag
  }),
  z.object({
    kind: z.literal('assign'),
    operator: z.enum(['=', '+=', '-=', '*=', '/=', '%=', '&=', '|=', '^=', '<<=', '>>=', '>>>=']),
    target: expressionSchema,
    value: expressionSchema,
    type: typeTag
  }),
  z.object({ kind: z.literal('paren'), expression: expressionSchema, type: typeTag }),
  z.object({ kind: z.literal('cast'), typeName: z.string(), expression: expressionSchema, type: typeTag }),
  z.object({
    kind: z.literal('conditional'),
    condition: expressionSchema,
    whenTrue: expressionSchema,
    whenFalse: expressionSchema,
    type: typeTag
  }),
  z.object({ kind: z.literal('index'), array: expressionSchema, index: expressionSchema, type: typeTag }),
  z.object({
    kind: z.literal('lambda'),
    parameters: z.array(z.object({ name: z.string(), typeName: z.string().optional() })),
    body: z.union([expressionSchema, blockSchema]),
    type: typeTag
  }),
  z.object({ kind: z.literal('methodRef'), target: z.string(), method: z.string(), type: typeTag })
]));

const annotations = z.array(z.string()).optional();

const statementSchema: z.ZodType<Statement, z.ZodTypeDef, unknown> = z.lazy(() => z.union([
  blockSchema,
  z.object({ kind: z.literal('expression'), expression: expressionSchema }),
  declarationSchema,
  z.object({
    kind: z.literal('if'),
    condition: expressionSchema,
    thenStatement: statementSchema,
    elseStatement: statementSchema.optional()
  }),
  z.object({ kind: z.literal('return'), expression: expressionSchema.optional() }),
  z.object({ kind: z.literal('break'), label: z.string().optional() }),
  z.object({ kind: z.literal('continue'), label: z.string().optional() }),
  z.object({ kind: z.literal('throw'), expression: expressionSchema }),
  z.object({
    kind: z.literal('forEach'),
    element: z.object({ name: z.string(), typeName: z.string(), isFinal: z.boolean().optional(), annotations }),
    iterable: expressionSchema,
    body: statementSchema
  }),
  z.object({
    kind: z.literal('for'),
    initializer: declarationSchema.optional(),
    condition: expressionSchema.optional(),
    updaters: z.array(expressionSchema).default([]),
    body: statementSchema
  }),
  z.object({ kind: z.literal('while'), condition: expressionSchema, body: statementSchema }),
  z.object({ kind: z.literal('doWhile'), body: statementSchema, condition: expressionSchema }),
  z.object({ kind: z.literal('labeled'), label: z.string(), body: statementSchema }),
  z.object({
    kind: z.literal('try'),
    block: blockSchema,
    catches: z.array(z.object({ exceptionType: z.string(), name: z.string(), body: blockSchema })).default([]),
    finallyBlock: blockSchema.optional()
  }),
  z.object({
    kind: z.literal('switch'),
    selector: expressionSchema,
    cases: z.array(z.object({ labels: z.array(expressionSchema), statements: z.array(statementSchema) }))
  }),
  z.object({ kind: z.literal('synchronized'), lock: expressionSchema, body: blockSchema }),
  z.object({ kind: z.literal('empty') })
]));

const blockSchema: z.ZodType<BlockStatement, z.ZodTypeDef, unknown> = z.object({
  kind: z.literal('block'),
  statements: z.array(statementSchema)
});

const declarationSchema = z.object({
  kind: z.literal('declaration'),
  typeName: z.string(),
  name: z.string(),
  initializer: expressionSchema.optional(),
  isFinal: z.boolean().optional(),
  annotations
});

const bindingSchema = z.object({
  name: z.string(),
  typeName: z.string(),
  isFinal: z.boolean().optional(),
  annotations
});

export const methodSourceSchema: z.ZodType<MethodSource, z.ZodTypeDef, unknown> = z.object({
  name: z.string(),
  parameters: z.array(bindingSchema).optional(),
  fields: z.array(bindingSchema.extend({ initializer: expressionSchema.optional() })).optional(),
  body: blockSchema
});

const methodFileSchema = z.union([
  methodSourceSchema.transform(method => [method]),
  z.array(methodSourceSchema),
  z.object({ methods: z.array(methodSourceSchema) }).transform(file => file.methods)
]);

/** Validates JSON syntax trees handed to the command line tool. */
export class MethodSourceParser {
  static parseMethod(input: unknown): MethodSource {
    const result = methodSourceSchema.safeParse(input);
    if (!result.success) {
      throw this.invalid(result.error);
    }
    return result.data;
  }

  /** A single method, an array of methods or `{ "methods": [...] }`. */
  static parseFile(input: unknown): MethodSource[] {
    const result = methodFileSchema.safeParse(input);
    if (!result.success) {
      throw this.invalid(result.error);
    }
    Logger.debug('MethodSourceParser', `Parsed ${result.data.length} method(s)`);
    return result.data;
  }

  static parseJson(text: string): MethodSource[] {
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new LoopConversionException(`Input is not valid JSON: ${message}`);
    }
    return this.parseFile(parsed);
  }

  private static invalid(error: z.ZodError): LoopConversionException {
    const issues = error.issues.slice(0, 5).map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    Logger.warn('MethodSourceParser', 'Rejected method source', issues);
    return new LoopConversionException(`Invalid method source: ${issues.join('; ')}`);
  }
}
