/**
 * Core constants for foldkit data structures
 */

import type { Empty } from './types';

// The one empty sequence every chain ends in
export const EMPTY: Empty = Object.freeze({ kind: 'empty' });

// Rendering tokens
export const EMPTY_TOKEN = 'Empty';
export const NODE_TOKEN = 'Node';
export const LEAF_TOKEN = 'Leaf';
export const BRANCH_TOKEN = 'Branch';
export const ARG_SEPARATOR = ', ';
