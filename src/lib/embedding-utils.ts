/**
 * Embedding Utilities
 *
 * Validation and distance computation for face embedding vectors.
 */

/**
 * Compute the Euclidean (L2) distance between two vectors
 *
 * @param a - First vector
 * @param b - Second vector
 * @returns Non-negative distance; 0 only for identical vectors
 * @throws Error if vectors have different dimensions
 *
 * @example
 * ```typescript
 * euclideanDistance([0, 0, 0], [0, 0.6, 0]); // 0.6
 * ```
 */
export function euclideanDistance(
	a: ArrayLike<number>,
	b: ArrayLike<number>
): number {
	if (a.length !== b.length) {
		throw new Error(
			`Vectors must have the same dimensions (got ${a.length} and ${b.length})`
		);
	}

	let sum = 0;
	for (let i = 0; i < a.length; i++) {
		const diff = (a[i] ?? 0) - (b[i] ?? 0);
		sum += diff * diff;
	}

	return Math.sqrt(sum);
}

/**
 * Check that every component is a finite number
 */
export function isFiniteVector(vector: ArrayLike<number>): boolean {
	if (vector.length === 0) {
		return false;
	}

	for (let i = 0; i < vector.length; i++) {
		const val = vector[i];
		if (val === undefined || !Number.isFinite(val)) {
			return false;
		}
	}

	return true;
}

/**
 * Index of the smallest value; ties resolve to the first occurrence
 *
 * @returns -1 for an empty list
 */
export function argmin(values: ArrayLike<number>): number {
	let best = -1;
	let bestValue = Infinity;

	for (let i = 0; i < values.length; i++) {
		const val = values[i] ?? Infinity;
		if (best === -1 || val < bestValue) {
			best = i;
			bestValue = val;
		}
	}

	return best;
}

/**
 * Copy a vector into a plain array so callers cannot mutate stored state
 */
export function copyVector(vector: ArrayLike<number>): number[] {
	return Array.from(vector);
}
