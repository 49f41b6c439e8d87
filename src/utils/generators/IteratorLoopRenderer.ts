import { LoopModel, SourceKind } from '../../types/model';
import { Expression, Statement } from '../../types/syntax';
import { JavaTypes } from '../syntax/JavaTypes';
import { block, call, declaration, labeled, name, whileLoop } from '../syntax/SyntaxFactory';
import { referencedNames } from '../syntax/SyntaxQueries';
import { LoopBodyBuilder } from './LoopBodyBuilder';

export interface LoopRendering {
  statements: Statement[];
  requiredSymbols: string[];
}

export interface LoopRenderOptions {
  label?: string;
  iteratorVariableName?: string;
  /** Names already bound around the loop that the iterator must not shadow. */
  reservedNames?: ReadonlySet<string>;
}

/**
 * Renders a model as
 * `Iterator<T> it = src.iterator(); while (it.hasNext()) { T x = it.next(); ... }`.
 */
export class IteratorLoopRenderer {
  static render(model: LoopModel, options: LoopRenderOptions = {}): LoopRendering {
    const requiredSymbols = ['java.util.Iterator'];
    const iteratorName = this.iteratorName(model, options);
    const elementType = model.element.typeName;
    const iteratorType = elementType === 'var' ? 'Iterator<?>' : `Iterator<${JavaTypes.boxed(elementType)}>`;

    let iterable: Expression = model.source.expression;
    if (model.source.kind === SourceKind.ARRAY) {
      iterable = call(name('Arrays'), 'stream', model.source.expression);
      requiredSymbols.push('java.util.Arrays');
    }

    const element = declaration(elementType, model.element.name, call(name(iteratorName), 'next'));
    if (model.element.isFinal) element.isFinal = true;
    const loop: Statement = whileLoop(
      call(name(iteratorName), 'hasNext'),
      block(element, ...LoopBodyBuilder.build(model))
    );

    return {
      statements: [
        declaration(iteratorType, iteratorName, call(iterable, 'iterator')),
        options.label ? labeled(options.label, loop) : loop
      ],
      requiredSymbols
    };
  }

  private static iteratorName(model: LoopModel, options: LoopRenderOptions): string {
    const base = options.iteratorVariableName ?? 'it';
    const taken = new Set<string>([model.element.name, ...(options.reservedNames ?? [])]);
    const body = LoopBodyBuilder.build(model);
    referencedNames([model.source.expression, ...body]).forEach(used => taken.add(used));
    if (!taken.has(base)) return base;
    for (let suffix = 2; ; suffix++) {
      const candidate = `${base}${suffix}`;
      if (!taken.has(candidate)) return candidate;
    }
  }
}
