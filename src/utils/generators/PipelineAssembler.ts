import { NotConvertibleReason } from '../../types/analysis';
import {
  CollectorKind,
  CollectTerminal,
  LoopModel,
  MatchKind,
  OperationKind,
  SourceDescriptor,
  SourceKind,
  TerminalKind
} from '../../types/model';
import { ConverterOptions } from '../../types/options';
import { BlockStatement, Expression, Statement, VariableDeclarationStatement } from '../../types/syntax';
import { PipelineScopeValidator } from '../analyzers/PipelineScopeValidator';
import { Logger } from '../Logger';
import { JavaTypes } from '../syntax/JavaTypes';
import {
  assign,
  block,
  booleanLiteral,
  call,
  expressionStatement,
  ifStatement,
  lambda,
  methodRef,
  name,
  prefix,
  returnStatement
} from '../syntax/SyntaxFactory';
import { SyntaxPrinter } from '../syntax/SyntaxPrinter';
import { stripParens } from '../syntax/SyntaxQueries';

export type AssemblyResult =
  | {
      ok: true;
      statements: Statement[];
      code: string;
      /** The preceding empty-collection declaration was folded into the result. */
      mergedDeclaration: boolean;
      requiredSymbols: string[];
    }
  | { ok: false; reason: NotConvertibleReason; detail?: string };

export interface StreamExpression {
  expression: Expression;
  /** Lambda parameter name the next stage receives. */
  parameterName: string;
  requiredSymbols: string[];
}

const MATCH_METHODS: Record<MatchKind, string> = {
  [MatchKind.ANY]: 'anyMatch',
  [MatchKind.NONE]: 'noneMatch',
  [MatchKind.ALL]: 'allMatch'
};

/**
 * Builds the replacement statement for a convertible loop: the source stream,
 * one call per operation, the terminal call and the statement wrapping it.
 */
export class PipelineAssembler {
  constructor(private readonly options: ConverterOptions) {}

  assemble(model: LoopModel, precedingStatement?: Statement): AssemblyResult {
    const scope = PipelineScopeValidator.validate(model);
    if (!scope.ok) {
      Logger.debug('PipelineAssembler', 'Scope validation failed', scope.detail);
      return scope.detail === undefined ? { ok: false, reason: scope.reason } : { ok: false, reason: scope.reason, detail: scope.detail };
    }
    const terminal = model.terminal;
    if (!terminal) {
      return { ok: false, reason: NotConvertibleReason.NO_TERMINAL };
    }

    if (
      terminal.kind === TerminalKind.FOR_EACH
      && model.operations.length === 0
      && model.source.kind !== SourceKind.ARRAY
      && this.options.preferDirectForEach
    ) {
      const direct = call(model.source.expression, 'forEach', lambda([model.element.name], this.lambdaBody(terminal.bodyStatements)));
      return this.result([expressionStatement(direct)], false, []);
    }

    const stream = this.buildStream(model);
    const symbols = [...stream.requiredSymbols];
    const parameter = stream.parameterName;

    switch (terminal.kind) {
      case TerminalKind.FOR_EACH: {
        const method = terminal.ordered ? 'forEachOrdered' : 'forEach';
        const pipeline = call(stream.expression, method, lambda([parameter], this.lambdaBody(terminal.bodyStatements)));
        return this.result([expressionStatement(pipeline)], false, symbols);
      }
      case TerminalKind.COLLECT: {
        const collected = this.collect(stream.expression, terminal.collectorKind, terminal.targetTypeName, symbols);
        return this.wrapCollect(collected, terminal, precedingStatement, symbols);
      }
      case TerminalKind.REDUCE: {
        const pipeline = call(stream.expression, 'reduce', terminal.identity, terminal.accumulator);
        return this.result([expressionStatement(assign(name(terminal.accumulatorVariableName), pipeline))], false, symbols);
      }
      case TerminalKind.MATCH: {
        const pipeline = call(stream.expression, MATCH_METHODS[terminal.matchKind], lambda([parameter], terminal.condition));
        const statement = terminal.matchKind === MatchKind.ANY
          ? ifStatement(pipeline, block(returnStatement(booleanLiteral(true))))
          : ifStatement(prefix('!', pipeline), block(returnStatement(booleanLiteral(false))));
        return this.result([statement], false, symbols);
      }
    }
  }

  /** Source stream followed by the map and filter calls, without a terminal. */
  buildStream(model: LoopModel): StreamExpression {
    const requiredSymbols: string[] = [];
    let expression = this.sourceStream(model.source, requiredSymbols);
    let parameterName = model.element.name;
    for (const operation of model.operations) {
      if (operation.kind === OperationKind.FILTER) {
        expression = call(expression, 'filter', lambda([parameterName], operation.predicate));
      } else {
        expression = call(expression, 'map', lambda([parameterName], operation.expression));
        parameterName = operation.producedVariableName;
      }
    }
    return { expression, parameterName, requiredSymbols };
  }

  /** `.collect(Collectors.toList())`, `.toList()`, `.collect(Collectors.toSet())` or `toCollection` for concrete targets. */
  collect(stream: Expression, collectorKind: CollectorKind, targetTypeName: string | undefined, symbols: string[]): Expression {
    if (targetTypeName !== undefined && JavaTypes.isConcreteCollection(targetTypeName)) {
      this.require(symbols, 'java.util.stream.Collectors');
      const collector = call(name('Collectors'), 'toCollection', methodRef(JavaTypes.erasure(targetTypeName), 'new'));
      return call(stream, 'collect', collector);
    }
    if (collectorKind === CollectorKind.TO_LIST && this.options.useStreamToList) {
      return call(stream, 'toList');
    }
    this.require(symbols, 'java.util.stream.Collectors');
    const method = collectorKind === CollectorKind.TO_SET ? 'toSet' : 'toList';
    return call(stream, 'collect', call(name('Collectors'), method));
  }

  /** `Type target = pipeline;` over a preceding empty declaration, otherwise `target = pipeline;`. */
  wrapCollect(
    collected: Expression,
    terminal: Pick<CollectTerminal, 'targetVariableName'>,
    precedingStatement: Statement | undefined,
    symbols: string[]
  ): AssemblyResult {
    const mergeable = this.options.mergeDeclarations && isEmptyCollectionDeclaration(precedingStatement, terminal.targetVariableName);
    if (mergeable && precedingStatement?.kind === 'declaration') {
      const merged: VariableDeclarationStatement = { ...precedingStatement, initializer: collected };
      return this.result([merged], true, symbols);
    }
    return this.result([expressionStatement(assign(name(terminal.targetVariableName), collected))], false, symbols);
  }

  private sourceStream(source: SourceDescriptor, symbols: string[]): Expression {
    switch (source.kind) {
      case SourceKind.ARRAY:
        this.require(symbols, 'java.util.Arrays');
        return call(name('Arrays'), 'stream', source.expression);
      case SourceKind.ITERABLE:
        this.require(symbols, 'java.util.stream.StreamSupport');
        return call(name('StreamSupport'), 'stream', call(source.expression, 'spliterator'), booleanLiteral(false));
      case SourceKind.COLLECTION:
        return call(source.expression, 'stream');
    }
  }

  private lambdaBody(statements: readonly Statement[]): Expression | BlockStatement {
    const [only] = statements;
    if (statements.length === 1 && only?.kind === 'expression') return only.expression;
    return block(...statements);
  }

  private require(symbols: string[], symbol: string): void {
    if (!symbols.includes(symbol)) symbols.push(symbol);
  }

  private result(statements: Statement[], mergedDeclaration: boolean, requiredSymbols: string[]): AssemblyResult {
    return {
      ok: true,
      statements,
      code: SyntaxPrinter.printStatements(statements),
      mergedDeclaration,
      requiredSymbols
    };
  }
}

/** `T name = new X<>();` or `new X<T>()` with no constructor arguments. */
export function isEmptyCollectionDeclaration(statement: Statement | undefined, targetName: string): boolean {
  if (!statement || statement.kind !== 'declaration' || statement.name !== targetName || !statement.initializer) return false;
  const initializer = stripParens(statement.initializer);
  return initializer.kind === 'new' && initializer.args.length === 0 && JavaTypes.sourceKindOf(initializer.typeName) !== undefined;
}
