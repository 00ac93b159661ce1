/**
 * Split Layout Core Type System
 *
 * Discriminated union types for layout tree nodes with type-safe traversal
 * and exhaustive pattern matching support.
 */

/**
 * Axis along which a branch arranges its children.
 * - horizontal: children sit side by side (left to right)
 * - vertical: children are stacked (top to bottom)
 */
export type SplitAxis = 'horizontal' | 'vertical';

/**
 * Discriminated union for layout tree nodes.
 * Branch-only fields (axis, children) cannot exist on a leaf, and a leaf's
 * content cannot exist on a branch.
 */
export type LayoutNode<TContent = unknown> = LeafNode<TContent> | BranchNode<TContent>;

/**
 * Leaf node holding displayable content.
 */
export interface LeafNode<TContent = unknown> {
	readonly type: 'leaf';

	/** Identifier, unique across the tree (caller responsibility) */
	readonly id: string;

	/** Externally-owned content reference. Never interpreted by the layout core. */
	readonly content: TContent;

	/** Relative size weight among siblings (positive) */
	readonly flex: number;
}

/**
 * Branch node splitting its space among children along an axis.
 * Children can be either leaf nodes or other branch nodes (arbitrary nesting).
 */
export interface BranchNode<TContent = unknown> {
	readonly type: 'branch';

	readonly id: string;

	readonly axis: SplitAxis;

	/**
	 * Child nodes, in visual order.
	 * Never empty; tree operations collapse a branch left with a single child.
	 */
	readonly children: readonly LayoutNode<TContent>[];

	readonly flex: number;
}

/**
 * Positional address of a node: `path[i]` is the child index to descend at depth `i`.
 * The empty path denotes the root.
 *
 * Paths are not stable identifiers. Any structural change above or around a
 * node can invalidate paths captured earlier.
 */
export type NodePath = readonly number[];

export interface Point {
	x: number;
	y: number;
}

export interface Size {
	width: number;
	height: number;
}

export interface Rect {
	x: number;
	y: number;
	width: number;
	height: number;
}
