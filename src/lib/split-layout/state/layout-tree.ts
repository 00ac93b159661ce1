/**
 * Layout Tree Operations
 *
 * Pure, path-addressed transforms over the immutable layout tree.
 * Every operation returns a new root that shares untouched subtrees with the
 * input, and returns the input itself when nothing changed. Invalid paths
 * degrade to a no-op instead of throwing.
 */

import type { IdGenerator } from '../../internal/index.js';
import {
	LayoutPreconditionError,
	type BranchNode,
	type LayoutNode,
	type LeafNode,
	type NodePath,
	type SplitAxis
} from '../types/index.js';

function assertValidFlex(flex: number, id: string): void {
	if (!Number.isFinite(flex) || flex <= 0) {
		throw new LayoutPreconditionError(
			'invalid-node',
			`Node "${id}" has invalid flex ${flex}: must be a positive finite number`
		);
	}
}

function assertValidId(id: string): void {
	if (id.length === 0) {
		throw new LayoutPreconditionError('invalid-node', 'Node id must be a non-empty string');
	}
}

/**
 * Create a leaf node.
 * @throws LayoutPreconditionError for an empty id or a non-positive flex
 */
export function createLeaf<TContent>(id: string, content: TContent, flex = 1): LeafNode<TContent> {
	assertValidId(id);
	assertValidFlex(flex, id);
	return { type: 'leaf', id, content, flex };
}

/**
 * Create a branch node.
 * @throws LayoutPreconditionError for an empty id, a non-positive flex or no children
 */
export function createBranch<TContent>(
	id: string,
	axis: SplitAxis,
	children: readonly LayoutNode<TContent>[],
	flex = 1
): BranchNode<TContent> {
	assertValidId(id);
	assertValidFlex(flex, id);
	if (children.length === 0) {
		throw new LayoutPreconditionError('invalid-node', `Branch "${id}" needs at least one child`);
	}
	return { type: 'branch', id, axis, children: [...children], flex };
}

/**
 * Starting layout for a list of pane contents, in order.
 * No contents gives a single `placeholder` leaf, one gives a single leaf, and
 * more give a root branch along `axis` with one leaf each.
 *
 * @example
 * ```typescript
 * createInitialLayout(['editor', 'terminal'], 'horizontal', null);
 * // branch "root" with leaves "leaf-0" and "leaf-1"
 * ```
 */
export function createInitialLayout<TContent>(
	contents: readonly TContent[],
	axis: SplitAxis,
	placeholder: TContent
): LayoutNode<TContent> {
	if (contents.length === 0) return createLeaf('empty-0', placeholder);
	if (contents.length === 1) return createLeaf('leaf-0', contents[0]);
	return createBranch(
		'root',
		axis,
		contents.map((content, i) => createLeaf(`leaf-${i}`, content))
	);
}

/**
 * Copy of `node` with a new flex. Returns `node` itself when the flex is unchanged.
 */
export function withFlex<TContent>(node: LayoutNode<TContent>, flex: number): LayoutNode<TContent> {
	if (node.flex === flex) return node;
	return { ...node, flex };
}

/**
 * Find the path to a node (leaf or branch) by id.
 * Pre-order depth-first: the first match wins. Returns [] when the root matches.
 */
export function findPath(root: LayoutNode, id: string): NodePath | undefined {
	function search(node: LayoutNode, currentPath: number[]): number[] | undefined {
		if (node.id === id) return currentPath;
		if (node.type === 'leaf') return undefined;
		for (let i = 0; i < node.children.length; i++) {
			const result = search(node.children[i], [...currentPath, i]);
			if (result) return result;
		}
		return undefined;
	}
	return search(root, []);
}

/**
 * Get the node at a path, or undefined if any index is out of bounds
 * or the path descends into a leaf.
 */
export function nodeAt<TContent>(
	root: LayoutNode<TContent>,
	path: NodePath
): LayoutNode<TContent> | undefined {
	let current = root;
	for (const index of path) {
		if (current.type !== 'branch') return undefined;
		if (index < 0 || index >= current.children.length) return undefined;
		current = current.children[index];
	}
	return current;
}

/**
 * Replace the node at `path`. The empty path replaces the whole tree.
 * Only the spine from the root to the target is rebuilt.
 */
export function replaceAt<TContent>(
	root: LayoutNode<TContent>,
	path: NodePath,
	newNode: LayoutNode<TContent>
): LayoutNode<TContent> {
	if (path.length === 0) return newNode;
	if (root.type !== 'branch') return root;

	const [index, ...rest] = path;
	if (index < 0 || index >= root.children.length) return root;

	const child = root.children[index];
	const updated = replaceAt(child, rest, newNode);
	if (updated === child) return root;

	const children = [...root.children];
	children[index] = updated;
	return { ...root, children };
}

/**
 * Insert `newNode` into the branch at `parentPath`, at `index` clamped to
 * [0, childCount]. No-op when the path is invalid or resolves to a leaf.
 */
export function insertAt<TContent>(
	root: LayoutNode<TContent>,
	parentPath: NodePath,
	index: number,
	newNode: LayoutNode<TContent>
): LayoutNode<TContent> {
	const parent = nodeAt(root, parentPath);
	if (!parent || parent.type !== 'branch') return root;

	const children = [...parent.children];
	const clamped = Math.min(Math.max(index, 0), children.length);
	children.splice(clamped, 0, newNode);
	return replaceAt(root, parentPath, { ...parent, children });
}

/**
 * Remove the node at `path`.
 *
 * Returns null when the whole tree goes away (empty path). A branch left with
 * a single child is replaced by that child, re-flexed to the branch's own
 * flex. A branch left empty is spliced out of its parent, applying the same
 * rule one level up. Invalid paths leave the tree unchanged.
 */
export function removeAt<TContent>(
	root: LayoutNode<TContent>,
	path: NodePath
): LayoutNode<TContent> | null {
	if (path.length === 0) return null;
	if (root.type !== 'branch') return root;

	const [index, ...rest] = path;
	if (index < 0 || index >= root.children.length) return root;

	const children = [...root.children];
	if (rest.length === 0) {
		children.splice(index, 1);
	} else {
		const child = root.children[index];
		const updated = removeAt(child, rest);
		if (updated === child) return root;
		if (updated === null) {
			children.splice(index, 1);
		} else {
			children[index] = updated;
		}
	}

	if (children.length === 0) return null;
	if (children.length === 1) return withFlex(children[0], root.flex);
	return { ...root, children };
}

/**
 * Wrap the node at `path` in a new two-child branch along `axis`.
 *
 * The new branch takes the target's flex; the target and `newSibling` are
 * re-flexed to 1. `insertBefore` puts `newSibling` first. No-op when the
 * path is invalid.
 */
export function wrapInBranch<TContent>(
	root: LayoutNode<TContent>,
	path: NodePath,
	axis: SplitAxis,
	newSibling: LayoutNode<TContent>,
	insertBefore: boolean,
	createBranchId: IdGenerator
): LayoutNode<TContent> {
	const target = nodeAt(root, path);
	if (!target) return root;

	const sibling = withFlex(newSibling, 1);
	const wrapped = withFlex(target, 1);
	const wrapper: BranchNode<TContent> = {
		type: 'branch',
		id: createBranchId(),
		axis,
		children: insertBefore ? [sibling, wrapped] : [wrapped, sibling],
		flex: target.flex
	};

	return replaceAt(root, path, wrapper);
}

/**
 * Structural equality: variant, id, axis, flex and children, recursively.
 * Leaf content is not compared.
 */
export function nodesEqual(a: LayoutNode, b: LayoutNode): boolean {
	if (a === b) return true;
	if (a.id !== b.id || a.flex !== b.flex) return false;
	if (a.type === 'leaf' || b.type === 'leaf') return a.type === b.type;
	if (a.axis !== b.axis || a.children.length !== b.children.length) return false;
	return a.children.every((child, i) => nodesEqual(child, b.children[i]));
}

/**
 * Traverse the tree depth-first (pre-order), calling visitor with each node and its path.
 */
export function traverseTree<TContent>(
	root: LayoutNode<TContent>,
	visitor: (node: LayoutNode<TContent>, path: NodePath) => void
): void {
	function visit(node: LayoutNode<TContent>, path: number[]): void {
		visitor(node, path);
		if (node.type === 'branch') {
			node.children.forEach((child, i) => visit(child, [...path, i]));
		}
	}
	visit(root, []);
}

/**
 * All leaves in visual order, with their paths.
 */
export function collectLeaves<TContent>(
	root: LayoutNode<TContent>
): Array<{ node: LeafNode<TContent>; path: NodePath }> {
	const result: Array<{ node: LeafNode<TContent>; path: NodePath }> = [];
	traverseTree(root, (node, path) => {
		if (node.type === 'leaf') {
			result.push({ node, path });
		}
	});
	return result;
}

export function countNodes(root: LayoutNode): number {
	let count = 0;
	traverseTree(root, () => {
		count++;
	});
	return count;
}
