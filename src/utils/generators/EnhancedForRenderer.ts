import { LoopModel } from '../../types/model';
import { Statement } from '../../types/syntax';
import { block, forEachLoop, labeled } from '../syntax/SyntaxFactory';
import { LoopBodyBuilder } from './LoopBodyBuilder';
import { LoopRenderOptions, LoopRendering } from './IteratorLoopRenderer';

/** Renders a model as `for (T x : src) { ... }`. */
export class EnhancedForRenderer {
  static render(model: LoopModel, options: LoopRenderOptions = {}): LoopRendering {
    const element = model.element.isFinal
      ? { name: model.element.name, typeName: model.element.typeName, isFinal: true }
      : { name: model.element.name, typeName: model.element.typeName };
    const loop: Statement = forEachLoop(element, model.source.expression, block(...LoopBodyBuilder.build(model)));
    return {
      statements: [options.label ? labeled(options.label, loop) : loop],
      requiredSymbols: []
    };
  }
}
