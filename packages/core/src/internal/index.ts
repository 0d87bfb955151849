/**
 * Internal modules barrel export
 */

// Constants
export { EMPTY, EMPTY_TOKEN, NODE_TOKEN, LEAF_TOKEN, BRANCH_TOKEN, ARG_SEPARATOR } from './constants';

// Errors
export { EmptyStructureError } from './errors';

// Sequence
export {
  emptySeq,
  prepend,
  isEmpty,
  seqFromArray,
  seqToArray,
  seqIter,
  head,
  tail,
  setHead,
  init,
  drop,
  dropWhile,
  foldRight,
  foldLeft,
  foldRightViaFoldLeft,
  sum,
  sumViaFoldRight,
  product,
  productViaFoldRight,
  length,
  lengthViaFoldRight,
  reverse,
  append,
  appendRecursive,
  concat,
  map,
  filter,
  flatMap,
  filterViaFlatMap,
  addOne,
  numbersToStrings,
  addPairwise,
  zipWith,
  hasSubsequence,
  seqEquals,
} from './sequence';

// BinaryTree
export {
  leaf,
  branch,
  fold,
  size,
  maximum,
  depth,
  mapTree,
  sizeViaFold,
  maximumViaFold,
  depthViaFold,
  mapTreeViaFold,
  treeLeaves,
  treeEquals,
} from './tree';

// Rendering
export { showSequence, showTree } from './render';

// Types
export type { Empty, Node, Sequence, Leaf, Branch, BinaryTree, Equality } from './types';
