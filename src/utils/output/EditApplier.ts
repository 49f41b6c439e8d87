import { EditAction, RewriteEdit } from '../../types/analysis';
import { BlockStatement, pathKey, Statement, StatementPath } from '../../types/syntax';

interface EditIndex {
  replacements: Map<string, Statement[]>;
  removals: Set<string>;
}

/**
 * Applies a report's edits to a copy of a method body. Statements are
 * addressed the same way the converter addresses them; several statements
 * replacing a single-statement slot are wrapped in a block.
 */
export function applyRewriteEdits(body: BlockStatement, edits: readonly RewriteEdit[]): BlockStatement {
  const index: EditIndex = { replacements: new Map(), removals: new Set() };
  for (const edit of edits) {
    if (edit.action === EditAction.REPLACE) {
      index.replacements.set(pathKey(edit.path), edit.statements);
    } else {
      index.removals.add(pathKey(edit.path));
    }
  }
  return { kind: 'block', statements: rebuildList(body.statements, [], index) };
}

function rebuildList(statements: readonly Statement[], listPath: StatementPath, index: EditIndex): Statement[] {
  return statements.flatMap((statement, position) => {
    const path = [...listPath, position];
    const key = pathKey(path);
    if (index.removals.has(key)) return [];
    return index.replacements.get(key) ?? [rebuildStatement(statement, path, index)];
  });
}

function rebuildSlot(statement: Statement, slotPath: StatementPath, index: EditIndex): Statement {
  if (statement.kind === 'block') {
    return { kind: 'block', statements: rebuildList(statement.statements, slotPath, index) };
  }
  const key = pathKey(slotPath);
  if (index.removals.has(key)) return { kind: 'empty' };
  const replacement = index.replacements.get(key);
  if (replacement) {
    const [only] = replacement;
    return replacement.length === 1 && only ? only : { kind: 'block', statements: replacement };
  }
  return rebuildStatement(statement, slotPath, index);
}

function rebuildBlock(block: BlockStatement, listPath: StatementPath, index: EditIndex): BlockStatement {
  return { kind: 'block', statements: rebuildList(block.statements, listPath, index) };
}

function rebuildStatement(statement: Statement, path: StatementPath, index: EditIndex): Statement {
  switch (statement.kind) {
    case 'block':
      return rebuildBlock(statement, path, index);
    case 'if': {
      const thenStatement = rebuildSlot(statement.thenStatement, [...path, 'then'], index);
      return statement.elseStatement
        ? { ...statement, thenStatement, elseStatement: rebuildSlot(statement.elseStatement, [...path, 'else'], index) }
        : { ...statement, thenStatement };
    }
    case 'forEach':
    case 'for':
    case 'while':
    case 'doWhile':
    case 'labeled':
      return { ...statement, body: rebuildSlot(statement.body, [...path, 'body'], index) };
    case 'try': {
      const rebuilt = {
        ...statement,
        block: rebuildBlock(statement.block, [...path, 'try'], index),
        catches: statement.catches.map((clause, position) => ({
          ...clause,
          body: rebuildBlock(clause.body, [...path, `catch:${position}`], index)
        }))
      };
      return statement.finallyBlock
        ? { ...rebuilt, finallyBlock: rebuildBlock(statement.finallyBlock, [...path, 'finally'], index) }
        : rebuilt;
    }
    case 'switch':
      return {
        ...statement,
        cases: statement.cases.map((switchCase, position) => ({
          ...switchCase,
          statements: rebuildList(switchCase.statements, [...path, `case:${position}`], index)
        }))
      };
    case 'synchronized':
      return { ...statement, body: rebuildBlock(statement.body, [...path, 'body'], index) };
    default:
      return statement;
  }
}
