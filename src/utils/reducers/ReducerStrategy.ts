import { ReducerKind } from '../../types/model';
import { Expression } from '../../types/syntax';
import { JavaTypes, NumericCategory } from '../syntax/JavaTypes';
import { binary, cast, conditional, lambda, methodRef, name, numberLiteral } from '../syntax/SyntaxFactory';

export interface ReducerContext {
  accumulatorTypeName?: string;
  /** Both the accumulator and the folded operand are known to be non-null. */
  nullSafe: boolean;
}

type CombinerFactory = (context: ReducerContext) => Expression;

const SUM_REFERENCES: Partial<Record<NumericCategory, string>> = {
  int: 'Integer',
  long: 'Long',
  double: 'Double'
};

const EXTREMUM_REFERENCES: Partial<Record<NumericCategory, string>> = {
  int: 'Integer',
  long: 'Long',
  double: 'Double',
  float: 'Float'
};

/** Accumulator categories without a reliable `::sum`; unknown types count as int. */
function categoryOf(context: ReducerContext): NumericCategory {
  return JavaTypes.numericCategory(context.accumulatorTypeName) ?? 'int';
}

/** `(a, b) -> a op b`, narrowed back with a cast for byte, short and char. */
function arithmeticLambda(operator: string, context: ReducerContext): Expression {
  const category = categoryOf(context);
  const body = binary(name('a'), operator, name('b'));
  return lambda(['a', 'b'], JavaTypes.isNarrow(category) ? cast(category, body) : body);
}

function sumCombiner(context: ReducerContext): Expression {
  const reference = SUM_REFERENCES[categoryOf(context)];
  return reference ? methodRef(reference, 'sum') : arithmeticLambda('+', context);
}

function extremumCombiner(method: 'max' | 'min'): CombinerFactory {
  return context => {
    const category = JavaTypes.numericCategory(context.accumulatorTypeName);
    if (category === undefined) return methodRef('Math', method);
    const reference = EXTREMUM_REFERENCES[category];
    if (reference) return methodRef(reference, method);
    const comparison = binary(name('a'), method === 'max' ? '>=' : '<=', name('b'));
    return lambda(['a', 'b'], conditional(comparison, name('a'), name('b')));
  };
}

const COMBINERS: Record<ReducerKind, CombinerFactory> = {
  [ReducerKind.INCREMENT]: sumCombiner,
  [ReducerKind.SUM]: sumCombiner,
  [ReducerKind.DECREMENT]: context => arithmeticLambda('-', context),
  [ReducerKind.DIFFERENCE]: context => arithmeticLambda('-', context),
  [ReducerKind.PRODUCT]: context => arithmeticLambda('*', context),
  [ReducerKind.STRING_CONCAT]: context =>
    context.nullSafe ? methodRef('String', 'concat') : lambda(['a', 'b'], binary(name('a'), '+', name('b'))),
  [ReducerKind.MAX]: extremumCombiner('max'),
  [ReducerKind.MIN]: extremumCombiner('min')
};

export class ReducerStrategy {
  static combiner(kind: ReducerKind, context: ReducerContext): Expression {
    return COMBINERS[kind](context);
  }

  /** Counting reducers map each element to this literal before folding. */
  static isCounting(kind: ReducerKind): boolean {
    return kind === ReducerKind.INCREMENT || kind === ReducerKind.DECREMENT;
  }

  /** Literal one of the accumulator's type: `1`, `1L`, `1.0`, `1.0f` or a narrowing cast. */
  static unitLiteral(accumulatorTypeName: string | undefined): Expression {
    const category = JavaTypes.numericCategory(accumulatorTypeName) ?? 'int';
    switch (category) {
      case 'long':
        return numberLiteral('1L');
      case 'double':
        return numberLiteral('1.0');
      case 'float':
        return numberLiteral('1.0f');
      case 'byte':
      case 'short':
      case 'char':
        return cast(category, numberLiteral('1'));
      case 'int':
        return numberLiteral('1');
    }
  }
}
