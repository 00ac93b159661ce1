/**
 * Path comparison helpers.
 */

import type { NodePath } from '../types/index.js';

export function pathsEqual(a: NodePath, b: NodePath): boolean {
	if (a.length !== b.length) return false;
	for (let i = 0; i < a.length; i++) {
		if (a[i] !== b[i]) return false;
	}
	return true;
}

/**
 * Whether `path` starts with every index of `prefix`.
 */
function hasPrefix(path: NodePath, prefix: NodePath): boolean {
	if (path.length < prefix.length) return false;
	for (let i = 0; i < prefix.length; i++) {
		if (path[i] !== prefix[i]) return false;
	}
	return true;
}

/**
 * Whether `path` lies strictly below `ancestor`.
 */
export function isDescendantPath(path: NodePath, ancestor: NodePath): boolean {
	return path.length > ancestor.length && hasPrefix(path, ancestor);
}

/**
 * Whether `path` lies strictly above `descendant`.
 */
export function isAncestorPath(path: NodePath, descendant: NodePath): boolean {
	return isDescendantPath(descendant, path);
}

/**
 * Whether two non-root paths share the same parent. A path is its own sibling.
 */
export function areSiblingPaths(a: NodePath, b: NodePath): boolean {
	if (a.length !== b.length || a.length === 0) return false;
	return hasPrefix(a, b.slice(0, -1));
}
