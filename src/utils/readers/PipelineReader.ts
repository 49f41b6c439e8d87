import {
  CollectorKind,
  LoopModel,
  MatchKind,
  OperationKind,
  PipelineOperation,
  ReducerKind,
  ReduceTerminal,
  SourceKind,
  Terminal,
  TerminalKind,
  UNUSED_PARAMETER_NAME
} from '../../types/model';
import { CallExpression, Expression, IfStatement, LambdaExpression, Statement } from '../../types/syntax';
import { JavaTypes } from '../syntax/JavaTypes';
import { name } from '../syntax/SyntaxFactory';
import { SyntaxPrinter } from '../syntax/SyntaxPrinter';
import { bodyStatements, isBooleanLiteral, isNameOf, referencedNames, stripParens } from '../syntax/SyntaxQueries';
import { TypeEnvironment } from '../syntax/TypeEnvironment';

export enum PipelineWrappingKind {
  STATEMENT = 'STATEMENT',
  ASSIGNMENT = 'ASSIGNMENT',
  DECLARATION = 'DECLARATION',
  GUARD = 'GUARD'
}

export type PipelineWrapping =
  | { kind: PipelineWrappingKind.STATEMENT }
  | { kind: PipelineWrappingKind.ASSIGNMENT; target: string }
  | { kind: PipelineWrappingKind.DECLARATION; target: string; typeName: string; isFinal: boolean }
  | { kind: PipelineWrappingKind.GUARD };

export interface PipelineReading {
  model: LoopModel;
  wrapping: PipelineWrapping;
}

interface ChainSource {
  kind: SourceKind;
  expression: Expression;
}

interface Chain {
  source: ChainSource;
  stages: CallExpression[];
  terminal: CallExpression;
  direct: boolean;
}

const TERMINAL_METHODS = new Set(['forEach', 'forEachOrdered', 'collect', 'toList', 'reduce', 'anyMatch', 'noneMatch', 'allMatch']);

/**
 * Reads the statements the pipeline assembler produces back into loop models:
 * `src.forEach(...)`, `src.stream()...` expression statements, assignments and
 * declarations of collect or reduce results, and match guards.
 */
export class PipelineReader {
  constructor(private readonly environment: TypeEnvironment) {}

  read(statement: Statement): PipelineReading | null {
    switch (statement.kind) {
      case 'expression': {
        const expression = stripParens(statement.expression);
        if (expression.kind === 'assign') {
          const target = stripParens(expression.target);
          if (expression.operator !== '=' || target.kind !== 'name') return null;
          return this.readAccumulation(expression.value, target.identifier, this.environment.typeOf(target), {
            kind: PipelineWrappingKind.ASSIGNMENT,
            target: target.identifier
          });
        }
        const model = this.readChain(expression, chain => this.forEachTerminal(chain));
        return model ? { model, wrapping: { kind: PipelineWrappingKind.STATEMENT } } : null;
      }
      case 'declaration':
        if (!statement.initializer) return null;
        return this.readAccumulation(statement.initializer, statement.name, statement.typeName, {
          kind: PipelineWrappingKind.DECLARATION,
          target: statement.name,
          typeName: statement.typeName,
          isFinal: statement.isFinal ?? false
        });
      case 'if':
        return this.readGuard(statement);
      default:
        return null;
    }
  }

  private readAccumulation(
    value: Expression,
    target: string,
    targetTypeName: string | undefined,
    wrapping: PipelineWrapping
  ): PipelineReading | null {
    const model = this.readChain(value, (chain, operations) =>
      this.collectTerminal(chain, target, targetTypeName) ?? this.reduceTerminal(chain, operations, target, targetTypeName));
    return model ? { model, wrapping } : null;
  }

  /** `if (chain.anyMatch(p)) { return true; }` and `if (!chain.noneMatch(p) / allMatch(p)) { return false; }`. */
  private readGuard(statement: IfStatement): PipelineReading | null {
    if (statement.elseStatement) return null;
    const inner = bodyStatements(statement.thenStatement);
    const [only] = inner;
    if (inner.length !== 1 || !only || only.kind !== 'return' || !only.expression) return null;

    const condition = stripParens(statement.condition);
    const negated = condition.kind === 'unary' && condition.operator === '!';
    const chainExpression = negated ? stripParens(condition.operand) : condition;
    const expected = negated ? ['noneMatch', 'allMatch'] : ['anyMatch'];
    if (!isBooleanLiteral(only.expression, !negated)) return null;

    const model = this.readChain(chainExpression, chain => {
      if (!expected.includes(chain.terminal.method)) return null;
      return this.matchTerminal(chain.terminal);
    });
    return model ? { model, wrapping: { kind: PipelineWrappingKind.GUARD } } : null;
  }

  private readChain(
    expression: Expression,
    readTerminal: (chain: Chain, operations: PipelineOperation[]) => Terminal | null
  ): LoopModel | null {
    const chain = this.unroll(expression);
    if (!chain) return null;

    const lambdas: LambdaExpression[] = [];
    for (const stage of chain.stages) {
      const fn = singleParameterLambda(stage.args);
      if (!fn || fn.body.kind === 'block') return null;
      lambdas.push(fn);
    }
    const terminalLambda = singleParameterLambda(chain.terminal.args);
    const parameterNames = [...lambdas, ...(terminalLambda ? [terminalLambda] : [])]
      .map(fn => fn.parameters[0]?.name)
      .filter((parameterName): parameterName is string => parameterName !== undefined);
    const resolved = this.environment.resolveSource(chain.source.expression);
    const elementName = parameterNames[0] ?? this.freshName(chain.source.expression, 'item');
    const typedParameter = lambdas[0]?.parameters[0]?.typeName ?? terminalLambda?.parameters[0]?.typeName;
    const elementTypeName = resolved?.elementTypeName ?? typedParameter ?? 'var';

    const operations: PipelineOperation[] = [];
    let current = elementName;
    chain.stages.forEach((stage, index) => {
      const fn = lambdas[index];
      if (!fn || fn.body.kind === 'block') return;
      const parameterName = fn.parameters[0]?.name ?? current;
      if (parameterName !== current) {
        operations.push({ kind: OperationKind.MAP, expression: name(current), producedVariableName: parameterName });
        current = parameterName;
      }
      if (stage.method === 'filter') {
        operations.push({ kind: OperationKind.FILTER, predicate: fn.body });
      } else {
        const produced = parameterNames[index + 1] ?? current;
        operations.push({ kind: OperationKind.MAP, expression: fn.body, producedVariableName: produced });
        current = produced;
      }
    });
    const terminalParameter = terminalLambda?.parameters[0]?.name;
    if (terminalParameter !== undefined && terminalParameter !== current) return null;

    const terminal = readTerminal(chain, operations);
    if (!terminal) return null;

    return {
      source: {
        kind: chain.source.kind,
        expression: chain.source.expression,
        expressionText: SyntaxPrinter.printExpression(chain.source.expression),
        elementTypeName
      },
      element: { name: elementName, typeName: elementTypeName, isFinal: false },
      operations,
      terminal,
      metadata: { hasBreak: false, hasLabeledContinue: false, modifiesSource: false }
    };
  }

  /** Splits `src.stream().filter(..).map(..).terminal(..)` into source, stages and terminal. */
  private unroll(expression: Expression): Chain | null {
    const calls: CallExpression[] = [];
    let cursor: Expression | undefined = stripParens(expression);
    while (cursor && cursor.kind === 'call') {
      calls.unshift(cursor);
      cursor = cursor.receiver ? stripParens(cursor.receiver) : undefined;
    }
    const terminal = calls[calls.length - 1];
    if (!terminal || !TERMINAL_METHODS.has(terminal.method)) return null;

    const origin = calls[0];
    const source = origin ? streamSource(origin) : null;
    if (source) {
      const stages = calls.slice(1, -1);
      if (calls.length < 2 || stages.some(stage => stage.method !== 'filter' && stage.method !== 'map')) return null;
      return { source, stages, terminal, direct: false };
    }

    if (terminal.method !== 'forEach' || !terminal.receiver) return null;
    const resolved = this.environment.resolveSource(terminal.receiver);
    if (resolved?.kind === SourceKind.ARRAY) return null;
    return {
      source: { kind: resolved?.kind ?? SourceKind.COLLECTION, expression: terminal.receiver },
      stages: [],
      terminal,
      direct: true
    };
  }

  private forEachTerminal(chain: Chain): Terminal | null {
    const { terminal } = chain;
    if (terminal.method !== 'forEach' && terminal.method !== 'forEachOrdered') return null;
    const fn = singleParameterLambda(terminal.args);
    if (!fn) return null;
    const ordered = terminal.method === 'forEachOrdered';
    const statements = fn.body.kind === 'block' ? fn.body.statements : [{ kind: 'expression' as const, expression: fn.body }];
    return { kind: TerminalKind.FOR_EACH, bodyStatements: statements, ordered };
  }

  private collectTerminal(chain: Chain, target: string, targetTypeName: string | undefined): Terminal | null {
    const { terminal } = chain;
    let collectorKind: CollectorKind | undefined;
    if (terminal.method === 'toList' && terminal.args.length === 0) {
      collectorKind = CollectorKind.TO_LIST;
    } else if (terminal.method === 'collect' && terminal.args.length === 1) {
      collectorKind = collectorKindOf(terminal.args[0]);
    }
    if (collectorKind === undefined) return null;
    return targetTypeName === undefined
      ? { kind: TerminalKind.COLLECT, collectorKind, targetVariableName: target }
      : { kind: TerminalKind.COLLECT, collectorKind, targetVariableName: target, targetTypeName };
  }

  private reduceTerminal(
    chain: Chain,
    operations: PipelineOperation[],
    target: string,
    targetTypeName: string | undefined
  ): Terminal | null {
    const { terminal } = chain;
    const [identity, accumulator] = terminal.args;
    if (terminal.method !== 'reduce' || terminal.args.length !== 2 || !identity || !accumulator) return null;
    let reducerKind = combinerKind(accumulator, targetTypeName);
    if (reducerKind === undefined) return null;

    const last = operations[operations.length - 1];
    if (last?.kind === OperationKind.MAP && isUnitLiteral(last.expression)) {
      if (reducerKind === ReducerKind.SUM) reducerKind = ReducerKind.INCREMENT;
      if (reducerKind === ReducerKind.DIFFERENCE) reducerKind = ReducerKind.DECREMENT;
      if (reducerKind === ReducerKind.INCREMENT || reducerKind === ReducerKind.DECREMENT) {
        operations[operations.length - 1] = { ...last, producedVariableName: UNUSED_PARAMETER_NAME };
      }
    }
    const reduce: ReduceTerminal = {
      kind: TerminalKind.REDUCE,
      reducerKind,
      accumulatorVariableName: target,
      identity,
      accumulator
    };
    return targetTypeName === undefined ? reduce : { ...reduce, accumulatorTypeName: targetTypeName };
  }

  private matchTerminal(terminal: CallExpression): Terminal | null {
    const fn = singleParameterLambda(terminal.args);
    if (!fn || fn.body.kind === 'block') return null;
    const matchKind = terminal.method === 'anyMatch' ? MatchKind.ANY : terminal.method === 'noneMatch' ? MatchKind.NONE : MatchKind.ALL;
    return { kind: TerminalKind.MATCH, matchKind, condition: fn.body };
  }

  private freshName(source: Expression, base: string): string {
    const taken = referencedNames([source]);
    let candidate = base;
    for (let suffix = 2; taken.has(candidate) || this.environment.lookup(candidate); suffix++) {
      candidate = `${base}${suffix}`;
    }
    return candidate;
  }
}

function singleParameterLambda(args: readonly Expression[]): LambdaExpression | undefined {
  const [only] = args;
  if (args.length !== 1 || !only) return undefined;
  const fn = stripParens(only);
  return fn.kind === 'lambda' && fn.parameters.length === 1 ? fn : undefined;
}

function streamSource(origin: CallExpression): ChainSource | null {
  if (origin.method !== 'stream' || !origin.receiver) return null;
  if (origin.args.length === 0) {
    return { kind: SourceKind.COLLECTION, expression: origin.receiver };
  }
  const [first, second] = origin.args;
  if (isNameOf(origin.receiver, 'Arrays') && origin.args.length === 1 && first) {
    return { kind: SourceKind.ARRAY, expression: first };
  }
  if (isNameOf(origin.receiver, 'StreamSupport') && origin.args.length === 2 && first && second && isBooleanLiteral(second, false)) {
    const spliterator = stripParens(first);
    if (spliterator.kind === 'call' && spliterator.method === 'spliterator' && spliterator.receiver && spliterator.args.length === 0) {
      return { kind: SourceKind.ITERABLE, expression: spliterator.receiver };
    }
  }
  return null;
}

function collectorKindOf(collector: Expression | undefined): CollectorKind | undefined {
  if (!collector) return undefined;
  const stripped = stripParens(collector);
  if (stripped.kind !== 'call' || !stripped.receiver || !isNameOf(stripped.receiver, 'Collectors')) return undefined;
  if (stripped.method === 'toList' && stripped.args.length === 0) return CollectorKind.TO_LIST;
  if (stripped.method === 'toSet' && stripped.args.length === 0) return CollectorKind.TO_SET;
  const [factory] = stripped.args;
  if (stripped.method === 'toCollection' && factory) {
    const reference = stripParens(factory);
    if (reference.kind === 'methodRef' && reference.method === 'new') {
      return JavaTypes.isSetType(reference.target) ? CollectorKind.TO_SET : CollectorKind.TO_LIST;
    }
  }
  return undefined;
}

/** Reducer kind of a `reduce` combiner, without the counting refinement. */
function combinerKind(combiner: Expression, accumulatorTypeName: string | undefined): ReducerKind | undefined {
  const stripped = stripParens(combiner);
  if (stripped.kind === 'methodRef') {
    if (stripped.method === 'sum') return ReducerKind.SUM;
    if (stripped.method === 'concat' && stripped.target === 'String') return ReducerKind.STRING_CONCAT;
    if (stripped.method === 'max') return ReducerKind.MAX;
    if (stripped.method === 'min') return ReducerKind.MIN;
    return undefined;
  }
  if (stripped.kind !== 'lambda' || stripped.parameters.length !== 2 || stripped.body.kind === 'block') return undefined;
  const [left, right] = stripped.parameters.map(parameter => parameter.name);
  if (left === undefined || right === undefined) return undefined;

  let body = stripParens(stripped.body);
  if (body.kind === 'cast') body = stripParens(body.expression);
  if (body.kind === 'binary' && isNameOf(body.left, left) && isNameOf(body.right, right)) {
    switch (body.operator) {
      case '+':
        return JavaTypes.isStringType(accumulatorTypeName) ? ReducerKind.STRING_CONCAT : ReducerKind.SUM;
      case '-':
        return ReducerKind.DIFFERENCE;
      case '*':
        return ReducerKind.PRODUCT;
      default:
        return undefined;
    }
  }
  if (body.kind === 'conditional') {
    const test = stripParens(body.condition);
    if (test.kind === 'binary' && isNameOf(test.left, left) && isNameOf(test.right, right)
      && isNameOf(body.whenTrue, left) && isNameOf(body.whenFalse, right)) {
      if (test.operator === '>=' || test.operator === '>') return ReducerKind.MAX;
      if (test.operator === '<=' || test.operator === '<') return ReducerKind.MIN;
    }
  }
  return undefined;
}

function isUnitLiteral(expression: Expression): boolean {
  let stripped = stripParens(expression);
  if (stripped.kind === 'cast') stripped = stripParens(stripped.expression);
  return stripped.kind === 'literal' && stripped.literalKind === 'number' && ['1', '1L', '1l', '1.0', '1.0f', '1.0F', '1.0d'].includes(stripped.value);
}

export function readPipelineStatement(statement: Statement, environment: TypeEnvironment): PipelineReading | null {
  return new PipelineReader(environment).read(statement);
}
