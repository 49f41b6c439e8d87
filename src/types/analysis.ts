import { Expression, Statement, StatementPath } from './syntax';
import { ElementBinding, LoopModel } from './model';

export enum LoopKind {
  ENHANCED_FOR = 'ENHANCED_FOR',
  INDEXED_FOR = 'INDEXED_FOR',
  ITERATOR_WHILE = 'ITERATOR_WHILE',
  UNSUPPORTED = 'UNSUPPORTED'
}

export enum ConversionDecision {
  UNKNOWN = 'UNKNOWN',
  CONVERTIBLE = 'CONVERTIBLE',
  NOT_CONVERTIBLE = 'NOT_CONVERTIBLE',
  SKIPPED_INNER_CONVERTED = 'SKIPPED_INNER_CONVERTED'
}

export enum NotConvertibleReason {
  UNSUPPORTED_LOOP = 'UNSUPPORTED_LOOP',
  UNSUPPORTED_SOURCE = 'UNSUPPORTED_SOURCE',
  EMPTY_BODY = 'EMPTY_BODY',
  CONTAINS_BREAK = 'CONTAINS_BREAK',
  LABELED_CONTINUE = 'LABELED_CONTINUE',
  UNLABELED_CONTINUE = 'UNLABELED_CONTINUE',
  CONTAINS_RETURN = 'CONTAINS_RETURN',
  CONTAINS_THROW = 'CONTAINS_THROW',
  DISALLOWED_STATEMENT = 'DISALLOWED_STATEMENT',
  MODIFIES_SOURCE = 'MODIFIES_SOURCE',
  SHARED_SOURCE = 'SHARED_SOURCE',
  NO_TERMINAL = 'NO_TERMINAL',
  SIDE_EFFECT = 'SIDE_EFFECT',
  CAPTURE_VIOLATION = 'CAPTURE_VIOLATION',
  SCOPE_VIOLATION = 'SCOPE_VIOLATION',
  NOT_A_PIPELINE = 'NOT_A_PIPELINE',
  INTERNAL_ERROR = 'INTERNAL_ERROR'
}

export enum ThreadSafetyLevel {
  LOCALLY_CREATED = 'LOCALLY_CREATED',
  CONCURRENT_SAFE = 'CONCURRENT_SAFE',
  IMMUTABLE = 'IMMUTABLE',
  SYNCHRONIZED_WRAPPER = 'SYNCHRONIZED_WRAPPER',
  POTENTIALLY_SHARED = 'POTENTIALLY_SHARED'
}

export interface ScopeInfo {
  readonly declaredVariables: ReadonlySet<string>;
  readonly modifiedVariables: ReadonlySet<string>;
}

/** An iteration construct normalised into source, element and body. */
export interface LoopCandidate {
  kind: LoopKind;
  /** Statement the rewrite replaces (the labeled statement when the loop has a label). */
  path: StatementPath;
  /** Sibling statements the rewrite deletes, such as an iterator declaration. */
  removedPaths: StatementPath[];
  /** Path of the loop statement itself, children are addressed below it. */
  loopPath: StatementPath;
  source?: Expression;
  element?: ElementBinding;
  body: Statement[];
  /** Names the loop header declares or updates outside the body (index variables). */
  headerDeclared: string[];
  precedingStatement?: Statement;
  precedingPath?: StatementPath;
  nextStatement?: Statement;
  label?: string;
}

export enum ExtractionStatus {
  EXTRACTED = 'EXTRACTED',
  ABORTED = 'ABORTED'
}

export type ExtractionResult =
  | { status: ExtractionStatus.EXTRACTED; model: LoopModel }
  | { status: ExtractionStatus.ABORTED; reason: NotConvertibleReason };

export type CheckResult =
  | { ok: true }
  | { ok: false; reason: NotConvertibleReason; detail?: string };

export enum EditAction {
  REPLACE = 'REPLACE',
  REMOVE = 'REMOVE'
}

export interface ReplaceEdit {
  action: EditAction.REPLACE;
  path: StatementPath;
  statements: Statement[];
  code: string;
}

export interface RemoveEdit {
  action: EditAction.REMOVE;
  path: StatementPath;
}

export type RewriteEdit = ReplaceEdit | RemoveEdit;

export interface LoopDecisionSummary {
  path: StatementPath;
  kind: LoopKind;
  decision: ConversionDecision;
  reason?: NotConvertibleReason;
  detail?: string;
  groupId?: number;
  /** Model the loop was converted through, present for CONVERTIBLE loops. */
  model?: LoopModel;
}

export interface ConversionReport {
  methodName: string;
  edits: RewriteEdit[];
  requiredSymbols: string[];
  decisions: LoopDecisionSummary[];
}
