import { b2i } from './common';

// Case and underscores do not count when names are compared.
function fold(s: string): string {
  return s.replace(/_/g, '').toLowerCase();
}

// nearest returns the candidate closest to x by edit distance, or "" if
// none is within half the length of x.
export function nearest(x: string, candidates: readonly string[]): string {
  const target = fold(x);
  let best = '';
  let bestDistance = (target.length + 1) / 2;
  for (const c of candidates) {
    const d = editDistance(target, fold(c), bestDistance);
    if (d < bestDistance) {
      bestDistance = d;
      best = c;
    }
  }
  return best;
}

// editDistance returns the Levenshtein distance between a and b, or some
// value above limit as soon as the distance is known to exceed it.
function editDistance(a: string, b: string, limit: number): number {
  if (a.length > b.length) {
    [a, b] = [b, a];
  }
  let start = 0;
  while (start < a.length && a[start] === b[start]) {
    start++;
  }
  a = a.slice(start);
  b = b.slice(start);
  if (a === '') {
    return b.length;
  }
  if (b.length - a.length > limit) {
    return b.length - a.length;
  }

  // prev[j] is the distance between the first i - 1 chars of a and the
  // first j chars of b
  let prev = Array.from({ length: b.length + 1 }, (_, j) => j);
  for (let i = 1; i <= a.length; i++) {
    const row = [i];
    let rowMin = i;
    for (let j = 1; j <= b.length; j++) {
      const cost = Math.min(prev[j - 1] + b2i(a[i - 1] !== b[j - 1]), prev[j] + 1, row[j - 1] + 1);
      row.push(cost);
      rowMin = Math.min(rowMin, cost);
    }
    if (rowMin > limit) {
      return rowMin;
    }
    prev = row;
  }
  return prev[b.length];
}

// suggest formats a "did you mean" hint for x, or "" when nothing is close.
export function suggest(x: string, candidates: readonly string[]): string {
  const best = nearest(x, candidates);
  return best === '' ? '' : ` (did you mean ${best}?)`;
}
