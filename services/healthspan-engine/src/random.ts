/**
 * Seeded random numbers for projections. A given seed always yields the
 * same sequence, so simulated outputs are reproducible.
 */

export type Rng = {
  /** Uniform in the open interval (0, 1). */
  next(): number;
  uniform(low: number, high: number): number;
  /** Standard normal draw (Box-Muller). */
  gaussian(): number;
};

const MODULUS = 4294967296;

export function createRng(seed: number): Rng {
  let state = seed >>> 0;
  let spare: number | null = null;

  const next = () => {
    state = (Math.imul(state, 1103515245) + 12345) >>> 0;
    return (state + 0.5) / MODULUS;
  };

  return {
    next,
    uniform: (low, high) => low + (high - low) * next(),
    gaussian: () => {
      if (spare !== null) {
        const z = spare;
        spare = null;
        return z;
      }
      const radius = Math.sqrt(-2 * Math.log(next()));
      const angle = 2 * Math.PI * next();
      spare = radius * Math.sin(angle);
      return radius * Math.cos(angle);
    }
  };
}

/**
 * Lower-triangular L with L·Lᵀ = matrix. Retries with growing diagonal
 * jitter and returns null when the matrix stays non-positive-definite.
 */
export function choleskyDecompose(matrix: readonly (readonly number[])[]): number[][] | null {
  const n = matrix.length;
  const at = (rows: readonly (readonly number[])[], i: number, j: number) => rows[i]?.[j] ?? 0;

  for (const jitter of [0, 1e-8, 1e-6, 1e-5, 1e-4, 1e-3, 1e-2]) {
    const lower = Array.from({ length: n }, () => new Array<number>(n).fill(0));
    let ok = true;
    for (let i = 0; i < n && ok; i++) {
      for (let j = 0; j <= i; j++) {
        let sum = 0;
        for (let k = 0; k < j; k++) sum += at(lower, i, k) * at(lower, j, k);
        const row = lower[i];
        if (!row) continue;
        if (i === j) {
          const diag = at(matrix, i, i) + jitter - sum;
          if (diag <= 0) {
            ok = false;
            break;
          }
          row[j] = Math.sqrt(diag);
        } else {
          row[j] = (at(matrix, i, j) - sum) / at(lower, j, j);
        }
      }
    }
    if (ok) return lower;
  }
  return null;
}

/** Independent normals mixed through a Cholesky factor. */
export function correlatedNormals(lower: readonly (readonly number[])[], rng: Rng): number[] {
  const z = lower.map(() => rng.gaussian());
  return lower.map((row) => row.reduce((sum, l, k) => sum + l * (z[k] ?? 0), 0));
}
