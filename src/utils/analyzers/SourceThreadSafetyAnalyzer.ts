import { ThreadSafetyLevel } from '../../types/analysis';
import { Expression } from '../../types/syntax';
import { JavaTypes } from '../syntax/JavaTypes';
import { simpleNameOf, stripParens } from '../syntax/SyntaxQueries';
import { BindingOrigin, TypeEnvironment } from '../syntax/TypeEnvironment';

const IMMUTABLE_FACTORIES: Record<string, ReadonlySet<string>> = {
  List: new Set(['of', 'copyOf']),
  Set: new Set(['of', 'copyOf']),
  Collections: new Set(['unmodifiableList', 'unmodifiableSet', 'unmodifiableCollection', 'unmodifiableSortedSet', 'emptyList', 'emptySet'])
};

const SYNCHRONIZED_FACTORIES = new Set(['synchronizedList', 'synchronizedSet', 'synchronizedCollection', 'synchronizedSortedSet']);

/**
 * Classifies where an iterated collection comes from. Only a source that may
 * be shared with other threads blocks index-based loop conversion.
 */
export class SourceThreadSafetyAnalyzer {
  constructor(private readonly environment: TypeEnvironment) {}

  classify(source: Expression): ThreadSafetyLevel {
    const stripped = stripParens(source);
    const fromCreation = classifyCreation(stripped);
    if (fromCreation) return fromCreation;

    const variableName = simpleNameOf(stripped);
    if (variableName === undefined) return ThreadSafetyLevel.POTENTIALLY_SHARED;
    const binding = stripped.kind === 'field'
      ? this.environment.lookupField(variableName)
      : this.environment.lookup(variableName);
    if (!binding) return ThreadSafetyLevel.POTENTIALLY_SHARED;

    if (binding.origin !== BindingOrigin.FIELD) return ThreadSafetyLevel.LOCALLY_CREATED;
    if (JavaTypes.isConcurrentSafe(binding.typeName)) return ThreadSafetyLevel.CONCURRENT_SAFE;
    if (binding.isFinal && binding.initializer) {
      const initialized = classifyCreation(stripParens(binding.initializer));
      if (initialized === ThreadSafetyLevel.IMMUTABLE || initialized === ThreadSafetyLevel.SYNCHRONIZED_WRAPPER) {
        return initialized;
      }
    }
    return ThreadSafetyLevel.POTENTIALLY_SHARED;
  }

  isSafeToConvert(source: Expression): boolean {
    return this.classify(source) !== ThreadSafetyLevel.POTENTIALLY_SHARED;
  }
}

function classifyCreation(expression: Expression): ThreadSafetyLevel | undefined {
  if (expression.kind === 'new') return ThreadSafetyLevel.LOCALLY_CREATED;
  if (expression.kind !== 'call' || !expression.receiver) return undefined;
  const owner = simpleNameOf(expression.receiver);
  if (owner === undefined) return undefined;
  if (IMMUTABLE_FACTORIES[owner]?.has(expression.method)) return ThreadSafetyLevel.IMMUTABLE;
  if (owner === 'Collections' && SYNCHRONIZED_FACTORIES.has(expression.method)) return ThreadSafetyLevel.SYNCHRONIZED_WRAPPER;
  return undefined;
}
