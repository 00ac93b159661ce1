/**
 * Drag and Drop Value Types
 *
 * Plain immutable values exchanged between the gesture layer, the hover zone
 * classifier and the layout controller.
 */

import type { NodePath, Rect, SplitAxis } from './types.js';

/**
 * Zone of a pane the pointer is hovering.
 * Edge zones produce a split, the center zone a replace.
 */
export type DropZone = 'left' | 'right' | 'top' | 'bottom' | 'center';

/**
 * Structural change a drop will perform.
 * - split: the target is wrapped in a new branch alongside the dropped node
 * - replace: the target is substituted by the dropped node
 */
export type DropAction = 'split' | 'replace';

/**
 * Drag payload identifying the node being dragged.
 */
export interface DragItem {
	/** Id of the dragged node */
	readonly id: string;

	/** Caller-defined tag (e.g. 'editor', 'terminal'). Only used for caller-side dispatch. */
	readonly kind: string;

	/**
	 * Path of the node when the drag started.
	 * Empty for externally-sourced items: the drop inserts a new node rather than moving one.
	 */
	readonly originalPath: NodePath;
}

/** Zones that produce a split. */
export type EdgeZone = Exclude<DropZone, 'center'>;

interface DropPreviewBase {
	readonly targetNodeId: string;

	readonly targetPath: NodePath;

	/** Area the drop would occupy, in pane-local coordinates */
	readonly previewRect: Rect;

	/** The hovered pane, in pane-local coordinates (origin at 0,0) */
	readonly paneRect: Rect;
}

/**
 * Preview of an edge drop: the target gets wrapped in a new branch.
 */
export interface SplitDropPreview extends DropPreviewBase {
	readonly zone: EdgeZone;
	readonly action: 'split';

	/** Axis of the wrapping branch */
	readonly splitAxis: SplitAxis;

	/** Whether the dropped node goes before the target (left/top) */
	readonly insertBefore: boolean;
}

/**
 * Preview of a center drop: the target gets replaced.
 */
export interface ReplaceDropPreview extends DropPreviewBase {
	readonly zone: 'center';
	readonly action: 'replace';
	readonly splitAxis: null;
	readonly insertBefore: false;
}

/**
 * The pending drop while a drag hovers a pane.
 *
 * Stored fields: targetNodeId, targetPath, zone, previewRect, paneRect.
 * `action`, `splitAxis` and `insertBefore` are derived from `zone`.
 */
export type DropPreview = SplitDropPreview | ReplaceDropPreview;
