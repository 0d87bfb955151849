/**
 * Deterministic debug rendering
 *
 * Output mirrors the constructors: `Node(1, Node(2, Empty))`,
 * `Branch(Leaf(2), Leaf(1))`.
 */

import { ARG_SEPARATOR, BRANCH_TOKEN, EMPTY_TOKEN, LEAF_TOKEN, NODE_TOKEN } from './constants';
import { foldRightViaFoldLeft } from './sequence';
import { fold } from './tree';
import type { BinaryTree, Sequence } from './types';

type Show<T> = (value: T) => string;

export function showSequence<T>(s: Sequence<T>, show: Show<T> = String): string {
  return foldRightViaFoldLeft<T, string>(
    s,
    EMPTY_TOKEN,
    (value, rest) => `${NODE_TOKEN}(${show(value)}${ARG_SEPARATOR}${rest})`
  );
}

export function showTree<T>(t: BinaryTree<T>, show: Show<T> = String): string {
  return fold<T, string>(
    t,
    (value) => `${LEAF_TOKEN}(${show(value)})`,
    (l, r) => `${BRANCH_TOKEN}(${l}${ARG_SEPARATOR}${r})`
  );
}
