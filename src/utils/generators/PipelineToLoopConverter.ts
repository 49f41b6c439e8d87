import { CollectorKind, CollectTerminal, TerminalKind } from '../../types/model';
import { ConverterOptions, TargetFormat } from '../../types/options';
import { Expression, Statement } from '../../types/syntax';
import { LoopConversionException } from '../LoopConversionException';
import { PipelineReading, PipelineWrapping, PipelineWrappingKind } from '../readers/PipelineReader';
import { JavaTypes } from '../syntax/JavaTypes';
import { assign, declaration, expressionStatement, name, newInstance } from '../syntax/SyntaxFactory';
import { isNameOf } from '../syntax/SyntaxQueries';
import { EnhancedForRenderer } from './EnhancedForRenderer';
import { IteratorLoopRenderer, LoopRendering } from './IteratorLoopRenderer';

/**
 * Rewrites a pipeline statement as a loop in the configured format, preceded
 * by the initialisation the loop accumulates into.
 */
export class PipelineToLoopConverter {
  constructor(private readonly options: ConverterOptions) {}

  convert(reading: PipelineReading, reservedNames: ReadonlySet<string> = new Set()): LoopRendering {
    const { model, wrapping } = reading;
    const terminal = model.terminal;
    if (!terminal) {
      throw new LoopConversionException('Pipeline has no terminal operation');
    }

    const prelude: Statement[] = [];
    const requiredSymbols: string[] = [];
    if (terminal.kind === TerminalKind.COLLECT) {
      const { statement, symbol } = this.emptyCollection(terminal, wrapping);
      prelude.push(statement);
      if (symbol) requiredSymbols.push(symbol);
    } else if (terminal.kind === TerminalKind.REDUCE) {
      const initial = this.initialValue(terminal.accumulatorVariableName, terminal.identity, wrapping);
      if (initial) prelude.push(initial);
    }

    const loop = this.renderLoop(reading, reservedNames);
    loop.requiredSymbols.forEach(symbol => {
      if (!requiredSymbols.includes(symbol)) requiredSymbols.push(symbol);
    });
    return { statements: [...prelude, ...loop.statements], requiredSymbols };
  }

  private renderLoop(reading: PipelineReading, reservedNames: ReadonlySet<string>): LoopRendering {
    switch (this.options.targetFormat) {
      case TargetFormat.ITERATOR_WHILE:
        return IteratorLoopRenderer.render(reading.model, {
          iteratorVariableName: this.options.iteratorVariableName,
          reservedNames
        });
      case TargetFormat.ENHANCED_FOR:
        return EnhancedForRenderer.render(reading.model);
      case TargetFormat.STREAM:
        throw new LoopConversionException('Pipelines are already in stream form');
    }
  }

  private emptyCollection(terminal: CollectTerminal, wrapping: PipelineWrapping): { statement: Statement; symbol?: string } {
    const declaredType = wrapping.kind === PipelineWrappingKind.DECLARATION ? wrapping.typeName : terminal.targetTypeName;
    let className = terminal.collectorKind === CollectorKind.TO_SET ? 'HashSet' : 'ArrayList';
    let symbol: string | undefined = `java.util.${className}`;
    if (declaredType !== undefined && JavaTypes.isConcreteCollection(declaredType)) {
      className = JavaTypes.erasure(declaredType);
      symbol = undefined;
    }
    const initializer = newInstance(`${className}<>`);

    if (wrapping.kind === PipelineWrappingKind.DECLARATION) {
      const statement = declaration(wrapping.typeName, wrapping.target, initializer);
      if (wrapping.isFinal) statement.isFinal = true;
      return symbol === undefined ? { statement } : { statement, symbol };
    }
    const statement = expressionStatement(assign(name(terminal.targetVariableName), initializer));
    return symbol === undefined ? { statement } : { statement, symbol };
  }

  /** The reduction starts from its identity; nothing is needed when that is the accumulator itself. */
  private initialValue(accumulator: string, identity: Expression, wrapping: PipelineWrapping): Statement | undefined {
    if (wrapping.kind === PipelineWrappingKind.DECLARATION) {
      return declaration(wrapping.typeName, accumulator, identity);
    }
    if (isNameOf(identity, accumulator)) return undefined;
    return expressionStatement(assign(name(accumulator), identity));
  }
}
