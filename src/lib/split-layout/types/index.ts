export type {
	SplitAxis,
	LayoutNode,
	LeafNode,
	BranchNode,
	NodePath,
	Point,
	Size,
	Rect
} from './types.js';
export type {
	DropZone,
	EdgeZone,
	DropAction,
	DragItem,
	DropPreview,
	SplitDropPreview,
	ReplaceDropPreview
} from './drag.js';
export type { DropError, Result, LayoutPreconditionCode } from './errors.js';
export { Ok, Err, LayoutPreconditionError } from './errors.js';
