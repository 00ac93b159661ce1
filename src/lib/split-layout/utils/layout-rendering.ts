/**
 * Layout Rendering Utilities
 *
 * Helpers for renderers that hand a branch's children to an external
 * split-view widget and tag panes with their paths.
 */

import type { BranchNode, NodePath } from '../types/index.js';

/**
 * Child flex weights normalized to percentages of the branch (summing to 100).
 *
 * @example
 * ```typescript
 * // children with flex 1, 1, 2
 * getFlexPercentages(branch); // [25, 25, 50]
 * ```
 */
export function getFlexPercentages(branch: BranchNode): number[] {
	const total = branch.children.reduce((sum, child) => sum + child.flex, 0);
	if (total <= 0) {
		return branch.children.map(() => 100 / branch.children.length);
	}
	return branch.children.map((child) => (child.flex / total) * 100);
}

/**
 * Encode a path for a data attribute. Format: comma-separated indices ("" for root).
 */
export function encodePath(path: NodePath): string {
	return path.join(',');
}

/**
 * Decode a data attribute back to a path.
 * Returns undefined when any segment is not a non-negative integer.
 */
export function decodePath(encoded: string): NodePath | undefined {
	if (encoded === '') return [];
	const segments = encoded.split(',');
	if (!segments.every((segment) => /^\d+$/.test(segment))) return undefined;
	return segments.map(Number);
}
