/**
 * Sequence - persistent singly-linked list
 *
 * Two fold primitives (foldRight, foldLeft) plus the stack-safe
 * foldRightViaFoldLeft; every derived operation goes through one of them.
 * Operations that need counted or paired descent (drop, init, zipWith...)
 * use plain structural recursion or a loop instead.
 */

import { EMPTY } from './constants';
import { EmptyStructureError } from './errors';
import type { Empty, Equality, Node, Sequence } from './types';

const strictEquals = <T>(a: T, b: T): boolean => a === b;

// =====================================================
// Construction
// =====================================================

export function emptySeq<T>(): Sequence<T> {
  return EMPTY;
}

export function prepend<T>(value: T, rest: Sequence<T>): Node<T> {
  return { kind: 'node', value, rest };
}

export function isEmpty<T>(s: Sequence<T>): s is Empty {
  return s.kind === 'empty';
}

export function seqFromArray<T>(values: readonly T[]): Sequence<T> {
  let s: Sequence<T> = EMPTY;
  for (let i = values.length - 1; i >= 0; i--) {
    s = prepend(values[i], s);
  }
  return s;
}

export function seqToArray<T>(s: Sequence<T>): T[] {
  const out: T[] = [];
  for (const v of seqIter(s)) out.push(v);
  return out;
}

export function* seqIter<T>(s: Sequence<T>): IterableIterator<T> {
  let cur = s;
  while (cur.kind === 'node') {
    yield cur.value;
    cur = cur.rest;
  }
}

// =====================================================
// Destructors
// =====================================================

export function head<T>(s: Sequence<T>): T {
  if (s.kind === 'empty') throw new EmptyStructureError('head');
  return s.value;
}

/** Tail of the empty sequence is the empty sequence. */
export function tail<T>(s: Sequence<T>): Sequence<T> {
  if (s.kind === 'empty') return EMPTY;
  return s.rest;
}

export function setHead<T>(s: Sequence<T>, value: T): Sequence<T> {
  if (s.kind === 'empty') throw new EmptyStructureError('setHead');
  return prepend(value, s.rest);
}

/**
 * All elements but the last. Copies every node except the dropped one,
 * recursing once per element.
 */
export function init<T>(s: Sequence<T>): Sequence<T> {
  if (s.kind === 'empty') throw new EmptyStructureError('init');
  if (s.rest.kind === 'empty') return EMPTY;
  return prepend(s.value, init(s.rest));
}

/** Drops the first `n` elements; a fractional `n` is truncated toward zero. */
export function drop<T>(s: Sequence<T>, n: number): Sequence<T> {
  let cur = s;
  let remaining = Math.trunc(n);
  while (remaining > 0 && cur.kind === 'node') {
    cur = cur.rest;
    remaining--;
  }
  return cur;
}

export function dropWhile<T>(s: Sequence<T>, pred: (value: T) => boolean): Sequence<T> {
  let cur = s;
  while (cur.kind === 'node' && pred(cur.value)) {
    cur = cur.rest;
  }
  return cur;
}

// =====================================================
// Fold primitives
// =====================================================

/**
 * Right fold: `f(s0, f(s1, ... f(sn, z)))`.
 *
 * Recurses once per element, so very long sequences can overflow the stack.
 * Use {@link foldRightViaFoldLeft} when that matters.
 */
export function foldRight<T, B>(s: Sequence<T>, z: B, f: (value: T, acc: B) => B): B {
  if (s.kind === 'empty') return z;
  return f(s.value, foldRight(s.rest, z, f));
}

/** Left fold: `f(...f(f(z, s0), s1)..., sn)`, in constant stack. */
export function foldLeft<T, B>(s: Sequence<T>, z: B, f: (acc: B, value: T) => B): B {
  let acc = z;
  let cur = s;
  while (cur.kind === 'node') {
    acc = f(acc, cur.value);
    cur = cur.rest;
  }
  return acc;
}

/** Same result as {@link foldRight}, built from a reverse and a left fold. */
export function foldRightViaFoldLeft<T, B>(s: Sequence<T>, z: B, f: (value: T, acc: B) => B): B {
  return foldLeft(reverse(s), z, (acc: B, value: T) => f(value, acc));
}

// =====================================================
// Derived operations
// =====================================================

// A zero stays zero, even against Infinity or NaN
const multiply = (a: number, b: number): number => (a === 0 || b === 0 ? 0 : a * b);

export function sum(ns: Sequence<number>): number {
  return foldLeft(ns, 0, (acc, n) => acc + n);
}

export function sumViaFoldRight(ns: Sequence<number>): number {
  return foldRight(ns, 0, (n, acc) => n + acc);
}

export function product(ds: Sequence<number>): number {
  return foldLeft<number, number>(ds, 1, multiply);
}

export function productViaFoldRight(ds: Sequence<number>): number {
  return foldRight<number, number>(ds, 1, multiply);
}

export function length<T>(s: Sequence<T>): number {
  return foldLeft(s, 0, (acc) => acc + 1);
}

export function lengthViaFoldRight<T>(s: Sequence<T>): number {
  return foldRight(s, 0, (_, acc) => acc + 1);
}

export function reverse<T>(s: Sequence<T>): Sequence<T> {
  return foldLeft<T, Sequence<T>>(s, EMPTY, (acc, value) => prepend(value, acc));
}

/** `a` followed by `b`. `b` is shared as the suffix of the result, never copied. */
export function append<T>(a: Sequence<T>, b: Sequence<T>): Sequence<T> {
  return foldRightViaFoldLeft<T, Sequence<T>>(a, b, prepend);
}

export function appendRecursive<T>(a: Sequence<T>, b: Sequence<T>): Sequence<T> {
  if (a.kind === 'empty') return b;
  return prepend(a.value, appendRecursive(a.rest, b));
}

export function concat<T>(ss: Sequence<Sequence<T>>): Sequence<T> {
  return foldRightViaFoldLeft<Sequence<T>, Sequence<T>>(ss, EMPTY, append);
}

export function map<T, U>(s: Sequence<T>, f: (value: T) => U): Sequence<U> {
  return foldRightViaFoldLeft<T, Sequence<U>>(s, EMPTY, (value, acc) => prepend(f(value), acc));
}

export function filter<T>(s: Sequence<T>, pred: (value: T) => boolean): Sequence<T> {
  return foldRightViaFoldLeft<T, Sequence<T>>(s, EMPTY, (value, acc) =>
    pred(value) ? prepend(value, acc) : acc
  );
}

export function flatMap<T, U>(s: Sequence<T>, f: (value: T) => Sequence<U>): Sequence<U> {
  return concat(map(s, f));
}

export function filterViaFlatMap<T>(s: Sequence<T>, pred: (value: T) => boolean): Sequence<T> {
  return flatMap<T, T>(s, (value) => (pred(value) ? prepend(value, EMPTY) : EMPTY));
}

export function addOne(ns: Sequence<number>): Sequence<number> {
  return foldRightViaFoldLeft<number, Sequence<number>>(ns, EMPTY, (n, acc) => prepend(n + 1, acc));
}

export function numbersToStrings(ds: Sequence<number>): Sequence<string> {
  return foldRightViaFoldLeft<number, Sequence<string>>(ds, EMPTY, (d, acc) =>
    prepend(String(d), acc)
  );
}

/** Element-wise sum, truncated to the shorter input. */
export function addPairwise(a: Sequence<number>, b: Sequence<number>): Sequence<number> {
  if (a.kind === 'empty' || b.kind === 'empty') return EMPTY;
  return prepend(a.value + b.value, addPairwise(a.rest, b.rest));
}

export function zipWith<A, B, C>(
  a: Sequence<A>,
  b: Sequence<B>,
  f: (x: A, y: B) => C
): Sequence<C> {
  if (a.kind === 'empty' || b.kind === 'empty') return EMPTY;
  return prepend(f(a.value, b.value), zipWith(a.rest, b.rest, f));
}

function startsWith<T>(s: Sequence<T>, prefix: Sequence<T>, eq: Equality<T>): boolean {
  let cur = s;
  let p = prefix;
  while (p.kind === 'node') {
    if (cur.kind === 'empty' || !eq(cur.value, p.value)) return false;
    cur = cur.rest;
    p = p.rest;
  }
  return true;
}

/**
 * Whether `sub` occurs in `s` as a contiguous run. On a mismatch the match
 * restarts one element after the previous starting point.
 */
export function hasSubsequence<T>(
  s: Sequence<T>,
  sub: Sequence<T>,
  eq: Equality<T> = strictEquals
): boolean {
  let start = s;
  while (true) {
    if (startsWith(start, sub, eq)) return true;
    if (start.kind === 'empty') return false;
    start = start.rest;
  }
}

export function seqEquals<T>(
  a: Sequence<T>,
  b: Sequence<T>,
  eq: Equality<T> = strictEquals
): boolean {
  let x = a;
  let y = b;
  while (x.kind === 'node' && y.kind === 'node') {
    if (!eq(x.value, y.value)) return false;
    x = x.rest;
    y = y.rest;
  }
  return x.kind === y.kind;
}
