/**
 * BinaryTree - strict binary tree, values in the leaves
 *
 * `fold` is the single recursion scheme; size/maximum/depth/map exist both
 * as instances of it and as direct structural recursion, and the two
 * versions must agree on every tree.
 */

import type { BinaryTree, Branch, Equality, Leaf } from './types';

export function leaf<T>(value: T): Leaf<T> {
  return { kind: 'leaf', value };
}

export function branch<T>(left: BinaryTree<T>, right: BinaryTree<T>): Branch<T> {
  return { kind: 'branch', left, right };
}

/**
 * Replaces every `Leaf` with `leafCase` and every `Branch` with `branchCase`.
 * Both subtrees are folded before `branchCase` sees them. Recursion depth
 * follows tree depth.
 */
export function fold<T, B>(
  t: BinaryTree<T>,
  leafCase: (value: T) => B,
  branchCase: (left: B, right: B) => B
): B {
  if (t.kind === 'leaf') return leafCase(t.value);
  const l = fold(t.left, leafCase, branchCase);
  const r = fold(t.right, leafCase, branchCase);
  return branchCase(l, r);
}

// =====================================================
// Direct structural recursion
// =====================================================

/** Number of nodes, branches included. */
export function size<T>(t: BinaryTree<T>): number {
  if (t.kind === 'leaf') return 1;
  return size(t.left) + size(t.right) + 1;
}

export function maximum(t: BinaryTree<number>): number {
  if (t.kind === 'leaf') return t.value;
  return Math.max(maximum(t.left), maximum(t.right));
}

/** Edges on the longest root-to-leaf path; a lone leaf has depth 0. */
export function depth<T>(t: BinaryTree<T>): number {
  if (t.kind === 'leaf') return 0;
  return Math.max(depth(t.left), depth(t.right)) + 1;
}

export function mapTree<T, U>(t: BinaryTree<T>, f: (value: T) => U): BinaryTree<U> {
  if (t.kind === 'leaf') return leaf(f(t.value));
  return branch(mapTree(t.left, f), mapTree(t.right, f));
}

// =====================================================
// Fold instances
// =====================================================

export function sizeViaFold<T>(t: BinaryTree<T>): number {
  return fold(t, () => 1, (l, r) => l + r + 1);
}

export function maximumViaFold(t: BinaryTree<number>): number {
  return fold(t, (v) => v, (l, r) => Math.max(l, r));
}

export function depthViaFold<T>(t: BinaryTree<T>): number {
  return fold(t, () => 0, (l, r) => Math.max(l, r) + 1);
}

export function mapTreeViaFold<T, U>(t: BinaryTree<T>, f: (value: T) => U): BinaryTree<U> {
  return fold<T, BinaryTree<U>>(t, (v) => leaf(f(v)), branch);
}

/** Leaf values, left to right. */
export function treeLeaves<T>(t: BinaryTree<T>): T[] {
  return fold<T, T[]>(t, (v) => [v], (l, r) => l.concat(r));
}

export function treeEquals<T>(
  a: BinaryTree<T>,
  b: BinaryTree<T>,
  eq: Equality<T> = (x, y) => x === y
): boolean {
  if (a.kind === 'leaf') return b.kind === 'leaf' && eq(a.value, b.value);
  if (b.kind === 'leaf') return false;
  return treeEquals(a.left, b.left, eq) && treeEquals(a.right, b.right, eq);
}
