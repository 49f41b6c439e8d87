import { LoopCandidate, LoopKind } from '../../types/analysis';
import { ElementBinding } from '../../types/model';
import {
  Expression,
  ForStatement,
  LoopStatement,
  Statement,
  StatementPath,
  VariableDeclarationStatement,
  WhileStatement
} from '../../types/syntax';
import { JavaTypes } from '../syntax/JavaTypes';
import { SyntaxPrinter } from '../syntax/SyntaxPrinter';
import { bodyStatements, isLoopStatement, isNameOf, referencedNames, stripParens } from '../syntax/SyntaxQueries';

interface IteratedBody {
  source: Expression;
  element: ElementBinding;
  body: Statement[];
}

export interface StatementSite {
  statement: Statement;
  path: StatementPath;
  /** Statement list holding the statement, when it sits in one. */
  siblings?: readonly Statement[];
  index?: number;
}

/**
 * Normalises the supported iteration constructs (enhanced for, index-based for,
 * iterator-driven while) into one candidate shape. Other loops come back as
 * UNSUPPORTED candidates so they still take part in the loop tree.
 */
export class LoopCandidateReader {
  static read(site: StatementSite): LoopCandidate | null {
    const { statement, path } = site;
    let loop: Statement = statement;
    let loopPath: StatementPath = path;
    let label: string | undefined;
    if (statement.kind === 'labeled' && isLoopStatement(statement.body)) {
      loop = statement.body;
      loopPath = [...path, 'body'];
      label = statement.label;
    }
    if (!isLoopStatement(loop)) return null;

    const candidate = this.readLoop(loop, site);
    candidate.path = path;
    candidate.loopPath = loopPath;
    if (label !== undefined) candidate.label = label;
    return candidate;
  }

  /** The iterator declaration an iterator loop at `index` consumes, if any. */
  static isIteratorDeclarationOf(siblings: readonly Statement[], index: number): boolean {
    const next = siblings[index + 1];
    if (next === undefined || next.kind !== 'while') return false;
    return this.readIteratorLoop(next, siblings, index + 1) !== null;
  }

  private static readLoop(loop: LoopStatement, site: StatementSite): LoopCandidate {
    const siblings = site.siblings ?? [];
    const index = site.index ?? -1;
    const base = this.baseCandidate(loop, site);

    switch (loop.kind) {
      case 'forEach':
        return {
          ...base,
          kind: LoopKind.ENHANCED_FOR,
          source: loop.iterable,
          element: toElement(loop.element)
        };
      case 'for': {
        const indexLoop = this.readIndexLoop(loop);
        return indexLoop ? { ...base, kind: LoopKind.INDEXED_FOR, ...indexLoop } : base;
      }
      case 'while': {
        const iteratorLoop = index >= 0 ? this.readIteratorLoop(loop, siblings, index) : null;
        if (!iteratorLoop) return base;
        const declarationPath = [...site.path.slice(0, -1), index - 1];
        const precedingIndex = index - 2;
        const candidate: LoopCandidate = {
          ...base,
          kind: LoopKind.ITERATOR_WHILE,
          source: iteratorLoop.source,
          element: iteratorLoop.element,
          body: iteratorLoop.body,
          removedPaths: [declarationPath]
        };
        delete candidate.precedingStatement;
        delete candidate.precedingPath;
        const preceding = siblings[precedingIndex];
        if (preceding !== undefined) {
          candidate.precedingStatement = preceding;
          candidate.precedingPath = [...site.path.slice(0, -1), precedingIndex];
        }
        return candidate;
      }
      case 'doWhile':
        return base;
    }
  }

  private static baseCandidate(loop: LoopStatement, site: StatementSite): LoopCandidate {
    const candidate: LoopCandidate = {
      kind: LoopKind.UNSUPPORTED,
      path: site.path,
      loopPath: site.path,
      removedPaths: [],
      body: bodyStatements(loop.body),
      headerDeclared: loop.kind === 'for' && loop.initializer ? [loop.initializer.name] : []
    };
    const siblings = site.siblings;
    const index = site.index;
    if (siblings !== undefined && index !== undefined) {
      const preceding = siblings[index - 1];
      const next = siblings[index + 1];
      if (preceding !== undefined) {
        candidate.precedingStatement = preceding;
        candidate.precedingPath = [...site.path.slice(0, -1), index - 1];
      }
      if (next !== undefined) candidate.nextStatement = next;
    }
    return candidate;
  }

  /**
   * `for (int i = 0; i < src.size(); i++) { T x = src.get(i); ... }` and the
   * array form with `arr.length` and `arr[i]`, when `i` is used nowhere else.
   */
  private static readIndexLoop(loop: ForStatement): IteratedBody | null {
    const init = loop.initializer;
    if (!init || !init.initializer || !isZero(init.initializer) || !loop.condition) return null;
    const indexName = init.name;
    if (loop.updaters.length !== 1 || !isIncrementOf(loop.updaters[0], indexName)) return null;

    const condition = stripParens(loop.condition);
    if (condition.kind !== 'binary' || condition.operator !== '<' || !isNameOf(condition.left, indexName)) return null;
    const bound = stripParens(condition.right);
    let source: Expression | undefined;
    let arraySource = false;
    if (bound.kind === 'call' && bound.method === 'size' && bound.args.length === 0 && bound.receiver) {
      source = bound.receiver;
    } else if (bound.kind === 'field' && bound.name === 'length') {
      source = bound.receiver;
      arraySource = true;
    }
    if (!source) return null;

    const [first, ...rest] = bodyStatements(loop.body);
    if (!first || first.kind !== 'declaration' || !first.initializer) return null;
    if (!isElementAccess(first.initializer, source, indexName, arraySource)) return null;
    if (referencedNames(rest).has(indexName)) return null;

    return { source, element: declarationElement(first), body: rest };
  }

  /** `Iterator<T> it = src.iterator(); while (it.hasNext()) { T x = it.next(); ... }` */
  private static readIteratorLoop(
    loop: WhileStatement,
    siblings: readonly Statement[],
    index: number
  ): IteratedBody | null {
    const condition = stripParens(loop.condition);
    if (condition.kind !== 'call' || condition.method !== 'hasNext' || condition.args.length !== 0 || !condition.receiver) return null;
    const iterator = stripParens(condition.receiver);
    if (iterator.kind !== 'name') return null;

    const declaration = siblings[index - 1];
    if (!declaration || declaration.kind !== 'declaration' || declaration.name !== iterator.identifier || !declaration.initializer) return null;
    if (JavaTypes.erasure(declaration.typeName) !== 'Iterator') return null;
    const creation = stripParens(declaration.initializer);
    if (creation.kind !== 'call' || creation.method !== 'iterator' || creation.args.length !== 0 || !creation.receiver) return null;

    const [first, ...rest] = bodyStatements(loop.body);
    if (!first || first.kind !== 'declaration' || !first.initializer) return null;
    const next = stripParens(first.initializer);
    if (next.kind !== 'call' || next.method !== 'next' || next.args.length !== 0 || !next.receiver || !isNameOf(next.receiver, iterator.identifier)) {
      return null;
    }
    if (referencedNames(rest).has(iterator.identifier)) return null;
    if (referencedNames(siblings.slice(index + 1)).has(iterator.identifier)) return null;

    return { source: creation.receiver, element: declarationElement(first), body: rest };
  }
}

function toElement(element: { name: string; typeName: string; isFinal?: boolean; annotations?: string[] }): ElementBinding {
  return element.annotations
    ? { name: element.name, typeName: element.typeName, isFinal: element.isFinal ?? false, annotations: element.annotations }
    : { name: element.name, typeName: element.typeName, isFinal: element.isFinal ?? false };
}

function declarationElement(declaration: VariableDeclarationStatement): ElementBinding {
  return toElement({
    name: declaration.name,
    typeName: declaration.typeName,
    isFinal: declaration.isFinal ?? false,
    ...(declaration.annotations ? { annotations: declaration.annotations } : {})
  });
}

function isZero(expression: Expression): boolean {
  const stripped = stripParens(expression);
  return stripped.kind === 'literal' && stripped.literalKind === 'number' && stripped.value === '0';
}

function isIncrementOf(expression: Expression | undefined, indexName: string): boolean {
  if (!expression) return false;
  if (expression.kind === 'postfix' || expression.kind === 'unary') {
    return expression.operator === '++' && isNameOf(expression.operand, indexName);
  }
  if (expression.kind === 'assign' && expression.operator === '+=') {
    const value = stripParens(expression.value);
    return isNameOf(expression.target, indexName) && value.kind === 'literal' && value.value === '1';
  }
  return false;
}

function isElementAccess(initializer: Expression, source: Expression, indexName: string, arraySource: boolean): boolean {
  const access = stripParens(initializer);
  const sourceText = SyntaxPrinter.printExpression(source);
  if (arraySource) {
    return access.kind === 'index'
      && SyntaxPrinter.printExpression(access.array) === sourceText
      && isNameOf(access.index, indexName);
  }
  const [argument] = access.kind === 'call' ? access.args : [];
  return access.kind === 'call'
    && access.method === 'get'
    && access.args.length === 1
    && access.receiver !== undefined
    && SyntaxPrinter.printExpression(access.receiver) === sourceText
    && argument !== undefined
    && isNameOf(argument, indexName);
}
