import { Expression, Statement } from './syntax';

export enum SourceKind {
  ARRAY = 'ARRAY',
  COLLECTION = 'COLLECTION',
  ITERABLE = 'ITERABLE'
}

export interface SourceDescriptor {
  readonly kind: SourceKind;
  readonly expression: Expression;
  readonly expressionText: string;
  readonly elementTypeName: string;
}

export interface ElementBinding {
  readonly name: string;
  readonly typeName: string;
  readonly isFinal: boolean;
  readonly annotations?: readonly string[];
}

export enum OperationKind {
  MAP = 'MAP',
  FILTER = 'FILTER'
}

export interface MapOperation {
  readonly kind: OperationKind.MAP;
  readonly expression: Expression;
  readonly producedVariableName: string;
  readonly outputTypeName?: string;
}

export interface FilterOperation {
  readonly kind: OperationKind.FILTER;
  readonly predicate: Expression;
}

export type PipelineOperation = MapOperation | FilterOperation;

export enum TerminalKind {
  FOR_EACH = 'FOR_EACH',
  COLLECT = 'COLLECT',
  REDUCE = 'REDUCE',
  MATCH = 'MATCH'
}

export enum CollectorKind {
  TO_LIST = 'TO_LIST',
  TO_SET = 'TO_SET'
}

export enum ReducerKind {
  INCREMENT = 'INCREMENT',
  DECREMENT = 'DECREMENT',
  SUM = 'SUM',
  DIFFERENCE = 'DIFFERENCE',
  PRODUCT = 'PRODUCT',
  STRING_CONCAT = 'STRING_CONCAT',
  MAX = 'MAX',
  MIN = 'MIN'
}

export enum MatchKind {
  ANY = 'ANY',
  NONE = 'NONE',
  ALL = 'ALL'
}

export interface ForEachTerminal {
  readonly kind: TerminalKind.FOR_EACH;
  readonly bodyStatements: readonly Statement[];
  readonly ordered: boolean;
}

export interface CollectTerminal {
  readonly kind: TerminalKind.COLLECT;
  readonly collectorKind: CollectorKind;
  readonly targetVariableName: string;
  readonly targetTypeName?: string;
}

export interface ReduceTerminal {
  readonly kind: TerminalKind.REDUCE;
  readonly reducerKind: ReducerKind;
  readonly accumulatorVariableName: string;
  readonly accumulatorTypeName?: string;
  /** Starting value of the reduction, the accumulator variable itself. */
  readonly identity: Expression;
  /** Combiner passed to `reduce`, a method reference or a two-parameter lambda. */
  readonly accumulator: Expression;
}

export interface MatchTerminal {
  readonly kind: TerminalKind.MATCH;
  readonly matchKind: MatchKind;
  readonly condition: Expression;
}

export type Terminal = ForEachTerminal | CollectTerminal | ReduceTerminal | MatchTerminal;

export interface LoopMetadata {
  readonly hasBreak: boolean;
  readonly hasLabeledContinue: boolean;
  readonly modifiesSource: boolean;
}

export interface LoopModel {
  readonly source: SourceDescriptor;
  readonly element: ElementBinding;
  readonly operations: readonly PipelineOperation[];
  readonly terminal: Terminal | null;
  readonly metadata: LoopMetadata;
}

/** Placeholder parameter name for mapped values a lambda never reads. */
export const UNUSED_PARAMETER_NAME = '_item';
