export type ReconciliationAction = 'none' | 'truncated' | 'padded' | 'mixed';

export interface ReconciliationResult {
  vectors: number[][];
  action: ReconciliationAction;
  /** Widths seen in the input batch, ascending */
  sourceWidths: number[];
  targetWidth: number;
}

/**
 * Fits one vector to `targetWidth`: wider vectors are truncated, narrower
 * ones right-padded with zeros. Always returns a new array.
 */
export function fitVector(vector: number[], targetWidth: number): number[] {
  if (vector.length >= targetWidth) {
    return vector.slice(0, targetWidth);
  }
  const padded = vector.slice();
  while (padded.length < targetWidth) {
    padded.push(0);
  }
  return padded;
}

/**
 * Fits every vector of a batch to the index width. Anything other than
 * `none` means the stored vectors differ from what the embedder produced;
 * callers log the action.
 */
export function reconcileDimensions(
  vectors: number[][],
  targetWidth: number
): ReconciliationResult {
  const sourceWidths = [...new Set(vectors.map(v => v.length))].sort(
    (a, b) => a - b
  );

  let truncated = false;
  let padded = false;
  const fitted = vectors.map(vector => {
    if (vector.length === targetWidth) {
      return vector;
    }
    if (vector.length > targetWidth) {
      truncated = true;
    } else {
      padded = true;
    }
    return fitVector(vector, targetWidth);
  });

  let action: ReconciliationAction = 'none';
  if (truncated && padded) {
    action = 'mixed';
  } else if (truncated) {
    action = 'truncated';
  } else if (padded) {
    action = 'padded';
  }

  return { vectors: fitted, action, sourceWidths, targetWidth };
}
