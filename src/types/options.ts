export enum TargetFormat {
  STREAM = 'STREAM',
  ITERATOR_WHILE = 'ITERATOR_WHILE',
  ENHANCED_FOR = 'ENHANCED_FOR'
}

export interface ConverterOptions {
  targetFormat: TargetFormat;
  /** Merge adjacent loops appending to one collection into a `Stream.concat` chain. */
  groupConsecutiveLoops: boolean;
  /** Fold a preceding empty-collection declaration of the collect target into the rewrite. */
  mergeDeclarations: boolean;
  /** Emit `source.forEach(...)` instead of `source.stream().forEach(...)` when nothing precedes the terminal. */
  preferDirectForEach: boolean;
  /** Collect into lists with `.toList()` instead of `Collectors.toList()`. */
  useStreamToList: boolean;
  checkSourceThreadSafety: boolean;
  iteratorVariableName: string;
}

export const DEFAULT_CONVERTER_OPTIONS: Readonly<ConverterOptions> = {
  targetFormat: TargetFormat.STREAM,
  groupConsecutiveLoops: true,
  mergeDeclarations: true,
  preferDirectForEach: true,
  useStreamToList: false,
  checkSourceThreadSafety: true,
  iteratorVariableName: 'it'
};

const TARGET_NAMES: Record<string, TargetFormat> = {
  'stream': TargetFormat.STREAM,
  'iterator': TargetFormat.ITERATOR_WHILE,
  'enhanced-for': TargetFormat.ENHANCED_FOR
};

/** Command line spelling of a target format. */
export function parseTargetFormat(value: string): TargetFormat {
  const target = TARGET_NAMES[value.toLowerCase()];
  if (!target) {
    throw new Error(`Unknown target "${value}". Use one of: ${Object.keys(TARGET_NAMES).join(', ')}`);
  }
  return target;
}

export function resolveConverterOptions(options: Partial<ConverterOptions> = {}): ConverterOptions {
  const resolved: ConverterOptions = { ...DEFAULT_CONVERTER_OPTIONS };
  for (const key of Object.keys(options)) {
    if (!isOptionKey(key)) continue;
    const value = options[key];
    if (value !== undefined) {
      assignOption(resolved, key, value);
    }
  }
  return resolved;
}

function isOptionKey(key: string): key is keyof ConverterOptions {
  return Object.prototype.hasOwnProperty.call(DEFAULT_CONVERTER_OPTIONS, key);
}

function assignOption<K extends keyof ConverterOptions>(target: ConverterOptions, key: K, value: ConverterOptions[K]): void {
  target[key] = value;
}
