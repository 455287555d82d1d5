export function dot(a: number[], b: number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i += 1) {
    sum += a[i] * b[i];
  }
  return sum;
}

export function norm(values: number[]): number {
  return Math.sqrt(dot(values, values));
}

/**
 * dot(a, b) / (|a| * |b|). Zero when either side is empty or a zero vector,
 * or when the lengths differ.
 */
export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length === 0 || b.length === 0 || a.length !== b.length) {
    return 0;
  }

  const denominator = norm(a) * norm(b);
  if (denominator === 0) {
    return 0;
  }
  return dot(a, b) / denominator;
}

export function normalizeVector(values: number[]): number[] {
  const length = norm(values);
  if (length === 0) {
    return [...values];
  }
  return values.map((value) => value / length);
}

export function roundScore(score: number, digits = 4): number {
  return Number(score.toFixed(digits));
}
