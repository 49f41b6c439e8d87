import { ConversionDecision, LoopCandidate, NotConvertibleReason, ScopeInfo } from '../../types/analysis';
import { LoopModel } from '../../types/model';
import { LoopConversionException } from '../LoopConversionException';

export interface LoopTreeNode {
  readonly id: number;
  /** Index of the enclosing loop in the arena, `null` for top-level loops. */
  readonly parentId: number | null;
  readonly childIds: number[];
  readonly candidate: LoopCandidate;
  readonly scope: ScopeInfo;
  decision: ConversionDecision;
  reason?: NotConvertibleReason;
  detail?: string;
  model?: LoopModel;
  groupId?: number;
  /** A statement inside the loop, other than a nested loop, is being rewritten. */
  containsRewrite: boolean;
}

/**
 * Arena of the loops of one method, built during a single traversal. Nodes
 * are pushed on entry and popped on exit; parents are referenced by index.
 */
export class LoopTree {
  private readonly nodes: LoopTreeNode[] = [];
  private readonly stack: number[] = [];

  pushLoop(candidate: LoopCandidate, scope: ScopeInfo): LoopTreeNode {
    const parentId = this.stack.length > 0 ? this.stack[this.stack.length - 1] ?? null : null;
    const node: LoopTreeNode = {
      id: this.nodes.length,
      parentId,
      childIds: [],
      candidate,
      scope,
      decision: ConversionDecision.UNKNOWN,
      containsRewrite: false
    };
    this.nodes.push(node);
    if (parentId !== null) {
      this.get(parentId).childIds.push(node.id);
    }
    this.stack.push(node.id);
    return node;
  }

  popLoop(): LoopTreeNode {
    const id = this.stack.pop();
    if (id === undefined) {
      throw new LoopConversionException('popLoop called without an open loop');
    }
    return this.get(id);
  }

  /** Innermost loop currently open. */
  current(): LoopTreeNode | undefined {
    const id = this.stack[this.stack.length - 1];
    return id === undefined ? undefined : this.get(id);
  }

  /** Open loops, innermost first. */
  openLoops(): LoopTreeNode[] {
    return [...this.stack].reverse().map(id => this.get(id));
  }

  markRewriteInside(): void {
    const node = this.current();
    if (node) node.containsRewrite = true;
  }

  get(id: number): LoopTreeNode {
    const node = this.nodes[id];
    if (!node) {
      throw new LoopConversionException(`Unknown loop node ${id}`);
    }
    return node;
  }

  parentOf(node: LoopTreeNode): LoopTreeNode | undefined {
    return node.parentId === null ? undefined : this.get(node.parentId);
  }

  /** Enclosing loops, nearest first. */
  ancestorsOf(node: LoopTreeNode): LoopTreeNode[] {
    const ancestors: LoopTreeNode[] = [];
    for (let parent = this.parentOf(node); parent; parent = this.parentOf(parent)) {
      ancestors.push(parent);
    }
    return ancestors;
  }

  childrenOf(node: LoopTreeNode): LoopTreeNode[] {
    return node.childIds.map(id => this.get(id));
  }

  roots(): LoopTreeNode[] {
    return this.nodes.filter(node => node.parentId === null);
  }

  all(): readonly LoopTreeNode[] {
    return this.nodes;
  }

  hasConvertibleDescendant(node: LoopTreeNode): boolean {
    return this.childrenOf(node).some(child =>
      child.decision === ConversionDecision.CONVERTIBLE
      || child.decision === ConversionDecision.SKIPPED_INNER_CONVERTED
      || this.hasConvertibleDescendant(child)
    );
  }

  convertibleNodes(): LoopTreeNode[] {
    return this.nodes.filter(node => node.decision === ConversionDecision.CONVERTIBLE);
  }
}
