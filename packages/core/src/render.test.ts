/**
 * Tests for Sequence and BinaryTree rendering
 */

import { describe, it, expect } from 'vitest';
import { EMPTY, branch, leaf, map, seqFromArray, showSequence, showTree } from './index';

describe('rendering', () => {
  it('should render sequences constructor by constructor', () => {
    expect(showSequence(seqFromArray([1, 2, 3]))).toBe('Node(1, Node(2, Node(3, Empty)))');
    expect(showSequence(EMPTY)).toBe('Empty');
  });

  it('should render elements with a custom formatter', () => {
    const s = seqFromArray([1.5, 2]);

    expect(showSequence(s, (n) => n.toFixed(1))).toBe('Node(1.5, Node(2.0, Empty))');
    expect(showSequence(map(s, (n) => `"${n}"`))).toBe('Node("1.5", Node("2", Empty))');
  });

  it('should render trees', () => {
    const t = branch(branch(leaf(2), leaf(1)), branch(leaf(8), leaf(3)));

    expect(showTree(t)).toBe('Branch(Branch(Leaf(2), Leaf(1)), Branch(Leaf(8), Leaf(3)))');
    expect(showTree(leaf('x'))).toBe('Leaf(x)');
  });

  it('should render long sequences', () => {
    const s = seqFromArray(Array.from({ length: 20_000 }, () => 0));
    const out = showSequence(s);

    expect(out.startsWith('Node(0, Node(0, ')).toBe(true);
    expect(out.endsWith(`Empty${')'.repeat(20_000)}`)).toBe(true);
  });
});
