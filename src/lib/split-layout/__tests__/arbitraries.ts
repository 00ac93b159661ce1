/**
 * Arbitrary Generators for Property-Based Testing
 *
 * Generates random but valid layout trees for testing with fast-check.
 * Shapes are generated first and then given unique ids in pre-order, so every
 * generated tree satisfies the id uniqueness the controller relies on.
 */

import * as fc from 'fast-check';
import type { LayoutNode, NodePath, SplitAxis } from '../types/index.js';
import { createBranch, createLeaf, traverseTree } from '../state/layout-tree.js';

type Shape =
	| { kind: 'leaf'; flex: number }
	| { kind: 'branch'; axis: SplitAxis; flex: number; children: Shape[] };

export const arbAxis = fc.constantFrom<SplitAxis>('horizontal', 'vertical');

export const arbFlex = fc.integer({ min: 1, max: 5 });

const arbLeafShape: fc.Arbitrary<Shape> = fc.record({
	kind: fc.constant('leaf' as const),
	flex: arbFlex
});

function arbBranchShape(depth: number): fc.Arbitrary<Shape> {
	const child = depth <= 1 ? arbLeafShape : fc.oneof(arbLeafShape, arbBranchShape(depth - 1));
	return fc.record({
		kind: fc.constant('branch' as const),
		axis: arbAxis,
		flex: arbFlex,
		children: fc.array(child, { minLength: 2, maxLength: 4 })
	});
}

function materialize(shape: Shape): LayoutNode<string> {
	let sequence = 0;
	const build = (node: Shape): LayoutNode<string> => {
		const id = `${node.kind}-${++sequence}`;
		if (node.kind === 'leaf') {
			return createLeaf(id, `content-${id}`, node.flex);
		}
		return createBranch(id, node.axis, node.children.map(build), node.flex);
	};
	return build(shape);
}

/**
 * Generate a tree rooted at a branch, at most three levels deep.
 * Every branch has two to four children.
 */
export const arbLayoutTree: fc.Arbitrary<LayoutNode<string>> = arbBranchShape(3).map(materialize);

/**
 * Paths of every node in the tree, root included.
 */
export function allPaths(root: LayoutNode): NodePath[] {
	const paths: NodePath[] = [];
	traverseTree(root, (_node, path) => paths.push(path));
	return paths;
}

/**
 * Paths of every leaf in the tree.
 */
export function leafPaths(root: LayoutNode): NodePath[] {
	const paths: NodePath[] = [];
	traverseTree(root, (node, path) => {
		if (node.type === 'leaf') paths.push(path);
	});
	return paths;
}

/**
 * A generated tree together with one of its node paths.
 */
export const arbTreeWithPath: fc.Arbitrary<[LayoutNode<string>, NodePath]> = arbLayoutTree.chain(
	(root) => fc.tuple(fc.constant(root), fc.constantFrom(...allPaths(root)))
);

/**
 * A generated tree together with one of its leaf paths. Leaves are never at the root.
 */
export const arbTreeWithLeafPath: fc.Arbitrary<[LayoutNode<string>, NodePath]> = arbLayoutTree.chain(
	(root) => fc.tuple(fc.constant(root), fc.constantFrom(...leafPaths(root)))
);
