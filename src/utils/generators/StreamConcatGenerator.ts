import { EditAction, RewriteEdit } from '../../types/analysis';
import { Expression } from '../../types/syntax';
import { Logger } from '../Logger';
import { LoopConversionException } from '../LoopConversionException';
import { call, name } from '../syntax/SyntaxFactory';
import { ConsecutiveLoopGroup } from '../tree/ConsecutiveLoopGroupDetector';
import { PipelineAssembler } from './PipelineAssembler';

export interface GroupRewrite {
  edits: RewriteEdit[];
  requiredSymbols: string[];
  code: string;
}

/**
 * Emits a loop group as `Stream.concat(a, b)` (nested for longer runs) collected
 * once into the shared target. The first loop is replaced and the others removed.
 */
export class StreamConcatGenerator {
  constructor(private readonly assembler: PipelineAssembler) {}

  generate(group: ConsecutiveLoopGroup): GroupRewrite {
    const [first, ...rest] = group.members;
    if (!first || rest.length === 0) {
      throw new LoopConversionException(`Loop group ${group.id} needs at least two loops`);
    }

    const symbols = ['java.util.stream.Stream'];
    const streams = group.members.map(member => {
      const stream = this.assembler.buildStream(member.model);
      stream.requiredSymbols.forEach(symbol => {
        if (!symbols.includes(symbol)) symbols.push(symbol);
      });
      return stream.expression;
    });
    const concatenated = streams.reduce<Expression | undefined>((combined, stream) =>
      combined === undefined ? stream : call(name('Stream'), 'concat', combined, stream), undefined);
    if (concatenated === undefined) {
      throw new LoopConversionException(`Loop group ${group.id} produced no stream`);
    }

    const collected = this.assembler.collect(concatenated, first.terminal.collectorKind, first.terminal.targetTypeName, symbols);
    const wrapped = this.assembler.wrapCollect(collected, first.terminal, first.candidate.precedingStatement, symbols);
    if (!wrapped.ok) {
      throw new LoopConversionException(`Loop group ${group.id} could not be wrapped`, wrapped.reason);
    }

    const edits: RewriteEdit[] = [
      { action: EditAction.REPLACE, path: first.candidate.path, statements: wrapped.statements, code: wrapped.code },
      ...rest.map((member): RewriteEdit => ({ action: EditAction.REMOVE, path: member.candidate.path }))
    ];
    if (wrapped.mergedDeclaration && first.candidate.precedingPath) {
      edits.push({ action: EditAction.REMOVE, path: first.candidate.precedingPath });
    }
    Logger.debug('StreamConcatGenerator', `Merged ${group.members.length} loops into ${group.targetVariableName}`);
    return { edits, requiredSymbols: wrapped.requiredSymbols, code: wrapped.code };
  }
}
