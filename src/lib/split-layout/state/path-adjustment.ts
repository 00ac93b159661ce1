/**
 * Source-path adjustment for move drops.
 *
 * A move drop first transforms the tree at the target (wrap or replace) and
 * then removes the dragged node from where it started. The start path was
 * captured against the tree before the transform, so it has to be re-derived
 * against the transformed tree before the removal.
 */

import type { NodePath } from '../types/index.js';
import { isDescendantPath } from './path-utils.js';

/**
 * Path of the original node after the node at `wrapPath` was wrapped.
 *
 * Wrapping swaps exactly one node for a two-child branch, so its parent keeps
 * its child count and only paths running through `wrapPath` change: they gain
 * one level at depth `wrapPath.length`, pointing at the slot the wrapped
 * subtree now occupies (1 when the new sibling went first, 0 otherwise).
 * Siblings and unrelated paths keep their indices.
 */
export function adjustPathAfterWrap(
	originalPath: NodePath,
	wrapPath: NodePath,
	insertBefore: boolean
): NodePath {
	if (!isDescendantPath(originalPath, wrapPath)) return originalPath;

	const adjusted = [...originalPath];
	adjusted.splice(wrapPath.length, 0, insertBefore ? 1 : 0);
	return adjusted;
}

/**
 * Path of the original node after the node at `replacePath` was replaced.
 * Replacing a node does not renumber anything.
 */
export function adjustPathAfterReplace(originalPath: NodePath, _replacePath: NodePath): NodePath {
	return originalPath;
}
