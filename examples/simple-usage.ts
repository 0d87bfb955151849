/**
 * Simple usage - Sequence + BinaryTree
 */

import {
  EmptyStructureError,
  branch,
  depth,
  dropWhile,
  foldRight,
  foldRightViaFoldLeft,
  hasSubsequence,
  init,
  leaf,
  mapTreeViaFold,
  maximum,
  prepend,
  product,
  seqFromArray,
  showSequence,
  showTree,
  size,
  sum,
  zipWith,
  type Sequence,
} from '../packages/core/src/index';

console.log('=== foldkit: Sequence ===\n');

// ===== Construction =====
console.log('1️⃣ Build a sequence');
const s = seqFromArray([1, 2, 3, 4, 5]);
console.log('s:', showSequence(s));

// ===== Folds =====
console.log('\n2️⃣ Folds');
console.log('sum:', sum(s));
console.log('product:', product(seqFromArray([2.0, 3.0, 4.0])));
console.log('foldRight rebuild:', showSequence(foldRight<number, Sequence<number>>(s, seqFromArray([]), prepend)));
console.log('foldRightViaFoldLeft rebuild:', showSequence(foldRightViaFoldLeft<number, Sequence<number>>(s, seqFromArray([]), prepend)));
console.log('✅ Same result, constant stack');

// ===== Derived operations =====
console.log('\n3️⃣ Derived operations');
console.log('dropWhile(x <= 3):', showSequence(dropWhile(s, x => x <= 3)));
console.log('init:', showSequence(init(seqFromArray([1, 2, 3]))));
console.log('zipWith(+):', showSequence(zipWith(seqFromArray([1, 2]), seqFromArray([4, 5, 6]), (a, b) => a + b)));
console.log('hasSubsequence [2,3]:', hasSubsequence(s, seqFromArray([2, 3])));
console.log('hasSubsequence [2,4]:', hasSubsequence(s, seqFromArray([2, 4])));

// ===== Errors =====
console.log('\n4️⃣ Empty structures');
try {
  init(seqFromArray<number>([]));
} catch (err) {
  if (!(err instanceof EmptyStructureError)) throw err;
  console.log('init([]) →', err.name, '-', err.message);
}

console.log('\n=== foldkit: BinaryTree ===\n');

const t = branch(branch(leaf(2), leaf(1)), branch(leaf(8), leaf(3)));
console.log('t:', showTree(t));
console.log('size:', size(t), 'maximum:', maximum(t), 'depth:', depth(t));
console.log('map(x10):', showTree(mapTreeViaFold(t, x => x * 10)));
