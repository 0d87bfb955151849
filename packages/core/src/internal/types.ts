/**
 * Core type definitions
 */

// Canonical empty sequence; terminates every chain
export interface Empty {
  readonly kind: 'empty';
}

// Element prepended to an already-built (possibly shared) sequence
export interface Node<T> {
  readonly kind: 'node';
  readonly value: T;
  readonly rest: Sequence<T>;
}

// Persistent singly-linked sequence
export type Sequence<T> = Empty | Node<T>;

export interface Leaf<T> {
  readonly kind: 'leaf';
  readonly value: T;
}

export interface Branch<T> {
  readonly kind: 'branch';
  readonly left: BinaryTree<T>;
  readonly right: BinaryTree<T>;
}

// Strict binary tree; values live in leaves only, never empty
export type BinaryTree<T> = Leaf<T> | Branch<T>;

export type Equality<T> = (a: T, b: T) => boolean;
