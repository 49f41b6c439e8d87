import { ConversionDecision, LoopCandidate, LoopKind, ScopeInfo } from '../../types/analysis';
import { LoopConversionException } from '../../utils/LoopConversionException';
import { LoopTree } from '../../utils/tree/LoopTree';

function candidate(path: number[]): LoopCandidate {
  return { kind: LoopKind.ENHANCED_FOR, path, loopPath: path, removedPaths: [], body: [], headerDeclared: [] };
}

const emptyScope: ScopeInfo = { declaredVariables: new Set(), modifiedVariables: new Set() };

describe('LoopTree', () => {
  let tree: LoopTree;

  beforeEach(() => {
    tree = new LoopTree();
  });

  it('links nested loops to their parents', () => {
    const outer = tree.pushLoop(candidate([0]), emptyScope);
    const inner = tree.pushLoop(candidate([0, 0]), emptyScope);
    const innermost = tree.pushLoop(candidate([0, 0, 0]), emptyScope);
    expect(tree.openLoops().map(node => node.id)).toEqual([2, 1, 0]);
    tree.popLoop();
    tree.popLoop();
    const sibling = tree.pushLoop(candidate([0, 1]), emptyScope);
    tree.popLoop();
    tree.popLoop();

    expect(inner.parentId).toBe(outer.id);
    expect(tree.childrenOf(outer)).toEqual([inner, sibling]);
    expect(tree.ancestorsOf(innermost).map(node => node.id)).toEqual([1, 0]);
    expect(tree.roots()).toEqual([outer]);
    expect(tree.current()).toBeUndefined();
  });

  it('finds convertible descendants at any depth', () => {
    const outer = tree.pushLoop(candidate([0]), emptyScope);
    const middle = tree.pushLoop(candidate([0, 0]), emptyScope);
    const inner = tree.pushLoop(candidate([0, 0, 0]), emptyScope);
    expect(tree.hasConvertibleDescendant(outer)).toBe(false);

    inner.decision = ConversionDecision.CONVERTIBLE;
    expect(tree.hasConvertibleDescendant(middle)).toBe(true);
    expect(tree.hasConvertibleDescendant(outer)).toBe(true);
    expect(tree.convertibleNodes()).toEqual([inner]);
  });

  it('marks the innermost open loop as containing a rewrite', () => {
    const outer = tree.pushLoop(candidate([0]), emptyScope);
    const inner = tree.pushLoop(candidate([0, 0]), emptyScope);
    tree.markRewriteInside();
    expect(inner.containsRewrite).toBe(true);
    expect(outer.containsRewrite).toBe(false);
  });

  it('rejects unbalanced pops and unknown ids', () => {
    expect(() => tree.popLoop()).toThrow(LoopConversionException);
    expect(() => tree.get(4)).toThrow('Unknown loop node 4');
  });
});
