import { SourceKind } from '../../types/model';

const COLLECTION_TYPES = new Set([
  'Collection', 'List', 'ArrayList', 'LinkedList', 'Vector', 'Stack',
  'Set', 'HashSet', 'LinkedHashSet', 'TreeSet', 'SortedSet', 'NavigableSet', 'EnumSet',
  'Queue', 'Deque', 'ArrayDeque', 'PriorityQueue',
  'BlockingQueue', 'LinkedBlockingQueue', 'ArrayBlockingQueue',
  'CopyOnWriteArrayList', 'CopyOnWriteArraySet', 'ConcurrentLinkedQueue',
  'ConcurrentLinkedDeque', 'ConcurrentSkipListSet'
]);

const CONCURRENT_SAFE_TYPES = new Set([
  'CopyOnWriteArrayList', 'CopyOnWriteArraySet', 'ConcurrentLinkedQueue',
  'ConcurrentLinkedDeque', 'ConcurrentSkipListSet'
]);

/** Concrete collection types whose constructor reference can feed `Collectors.toCollection`. */
const CONCRETE_COLLECTION_TYPES = new Set([
  'ArrayList', 'LinkedList', 'HashSet', 'LinkedHashSet', 'TreeSet', 'ArrayDeque', 'CopyOnWriteArrayList'
]);

const BOXED_TYPES: Record<string, string> = {
  int: 'Integer',
  long: 'Long',
  double: 'Double',
  float: 'Float',
  short: 'Short',
  byte: 'Byte',
  char: 'Character',
  boolean: 'Boolean'
};

export type NumericCategory = 'int' | 'long' | 'double' | 'float' | 'byte' | 'short' | 'char';

export class JavaTypes {
  /** `java.util.List<String>` becomes `List`. */
  static erasure(typeName: string): string {
    const withoutGenerics = typeName.replace(/<.*>/s, '').trim();
    const segments = withoutGenerics.split('.');
    return segments[segments.length - 1] ?? withoutGenerics;
  }

  static isArrayType(typeName: string): boolean {
    return typeName.trim().endsWith('[]');
  }

  static typeArguments(typeName: string): string[] {
    const start = typeName.indexOf('<');
    const end = typeName.lastIndexOf('>');
    if (start < 0 || end <= start) return [];
    const inner = typeName.slice(start + 1, end);
    const args: string[] = [];
    let depth = 0;
    let current = '';
    for (const char of inner) {
      if (char === '<') depth++;
      if (char === '>') depth--;
      if (char === ',' && depth === 0) {
        args.push(current.trim());
        current = '';
      } else {
        current += char;
      }
    }
    if (current.trim()) args.push(current.trim());
    return args;
  }

  static elementTypeOf(typeName: string): string | undefined {
    if (this.isArrayType(typeName)) {
      return typeName.trim().slice(0, -2).trim();
    }
    const [first] = this.typeArguments(typeName);
    if (first === undefined || first === '?') return undefined;
    return first.replace(/^\?\s+extends\s+/, '');
  }

  static sourceKindOf(typeName: string): SourceKind | undefined {
    if (this.isArrayType(typeName)) return SourceKind.ARRAY;
    const erased = this.erasure(typeName);
    if (COLLECTION_TYPES.has(erased)) return SourceKind.COLLECTION;
    if (erased === 'Iterable') return SourceKind.ITERABLE;
    return undefined;
  }

  static isSetType(typeName: string): boolean {
    return this.erasure(typeName).includes('Set');
  }

  static isConcurrentSafe(typeName: string): boolean {
    return CONCURRENT_SAFE_TYPES.has(this.erasure(typeName));
  }

  static isConcreteCollection(typeName: string): boolean {
    return CONCRETE_COLLECTION_TYPES.has(this.erasure(typeName));
  }

  static isStringType(typeName: string | undefined): boolean {
    return typeName !== undefined && (typeName === 'String' || typeName === 'java.lang.String');
  }

  static boxed(typeName: string): string {
    return BOXED_TYPES[typeName] ?? typeName;
  }

  static isPrimitive(typeName: string): boolean {
    return Object.prototype.hasOwnProperty.call(BOXED_TYPES, typeName);
  }

  /** Numeric category of a primitive or wrapper type, `undefined` for anything else. */
  static numericCategory(typeName: string | undefined): NumericCategory | undefined {
    if (typeName === undefined) return undefined;
    switch (this.erasure(typeName)) {
      case 'int':
      case 'Integer':
        return 'int';
      case 'long':
      case 'Long':
        return 'long';
      case 'double':
      case 'Double':
        return 'double';
      case 'float':
      case 'Float':
        return 'float';
      case 'short':
      case 'Short':
        return 'short';
      case 'byte':
      case 'Byte':
        return 'byte';
      case 'char':
      case 'Character':
        return 'char';
      default:
        return undefined;
    }
  }

  static isNarrow(category: NumericCategory | undefined): category is 'byte' | 'short' | 'char' {
    return category === 'byte' || category === 'short' || category === 'char';
  }
}
