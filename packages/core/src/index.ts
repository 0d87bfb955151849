/**
 * foldkit – persistent Sequence + BinaryTree
 *
 * - seqFromArray([...])      → immutable singly-linked Sequence
 * - leaf(v) / branch(l, r)   → immutable strict BinaryTree
 * - foldLeft / foldRight     → every Sequence operation is built on these
 * - fold                     → every BinaryTree operation is built on this
 *
 * Nothing is ever mutated: operations return new structures that share
 * unchanged parts with their inputs.
 */

export * from './internal';
