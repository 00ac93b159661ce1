/**
 * Shared layout fixtures. Leaf content is the leaf id prefixed with "content-".
 */

import { createBranch, createLeaf } from '../state/layout-tree.js';
import type { LayoutNode, LeafNode, SplitAxis } from '../types/index.js';

export function leaf(id: string, flex = 1): LeafNode<string> {
	return createLeaf(id, `content-${id}`, flex);
}

export function row(id: string, children: LayoutNode<string>[], flex = 1): LayoutNode<string> {
	return createBranch(id, 'horizontal', children, flex);
}

export function column(id: string, children: LayoutNode<string>[], flex = 1): LayoutNode<string> {
	return createBranch(id, 'vertical', children, flex);
}

export function branch(
	id: string,
	axis: SplitAxis,
	children: LayoutNode<string>[],
	flex = 1
): LayoutNode<string> {
	return createBranch(id, axis, children, flex);
}
