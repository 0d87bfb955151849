/**
 * Benchmark: right folds (direct vs via foldLeft) and derived operations
 */

import { bench, describe } from 'vitest';
import {
  append,
  filter,
  foldLeft,
  foldRight,
  foldRightViaFoldLeft,
  map,
  reverse,
  seqFromArray,
} from '../packages/core/src/index';

// ===== Setup =====
const SIZE = 5000;

function createArray(size: number): number[] {
  return Array.from({ length: size }, (_, i) => i);
}

const nativeArr = createArray(SIZE);
const seq = seqFromArray(nativeArr);

// ===== Folds =====
describe(`Sum (${SIZE} items)`, () => {
  bench('Native reduce', () => {
    nativeArr.reduce((a, b) => a + b, 0);
  });

  bench('foldLeft', () => {
    foldLeft(seq, 0, (acc, n) => acc + n);
  });

  bench('foldRight', () => {
    foldRight(seq, 0, (n, acc) => n + acc);
  });

  bench('foldRightViaFoldLeft', () => {
    foldRightViaFoldLeft(seq, 0, (n, acc) => n + acc);
  });
});

// ===== Derived operations =====
describe(`Map (${SIZE} items)`, () => {
  bench('Native', () => {
    nativeArr.map(x => x * 2);
  });

  bench('Sequence', () => {
    map(seq, x => x * 2);
  });
});

describe(`Filter (${SIZE} items)`, () => {
  bench('Native', () => {
    nativeArr.filter(x => x % 2 === 0);
  });

  bench('Sequence', () => {
    filter(seq, x => x % 2 === 0);
  });
});

describe(`Append (${SIZE} + ${SIZE})`, () => {
  bench('Native concat', () => {
    nativeArr.concat(nativeArr);
  });

  bench('Sequence append', () => {
    append(seq, seq);
  });
});

describe(`Reverse (${SIZE} items)`, () => {
  bench('Native (copy)', () => {
    nativeArr.slice().reverse();
  });

  bench('Sequence', () => {
    reverse(seq);
  });
});
