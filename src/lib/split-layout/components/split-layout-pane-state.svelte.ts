/**
 * SplitLayoutPaneState - Headless State for a Draggable Drop-Target Pane
 *
 * Bridges one rendered pane to the SplitLayoutController: builds the pane's
 * drag payload, forwards pointer hover ticks, and exposes reactive props and
 * preview geometry for the renderer.
 */

import type { ReadableBoxedValues } from '../../internal/index.js';
import { boolToEmptyStrOrUndef, boolToStr } from '../../internal/index.js';
import type { DragItem, DropPreview, NodePath, Point, Rect, Size } from '../types/index.js';
import type {
	NodeBuilder,
	SplitLayoutController
} from '../state/split-layout-controller.svelte.js';
import { createDragItem } from '../utils/drop-preview.js';
import { encodePath } from '../utils/layout-rendering.js';
import { SplitLayoutRootContext } from './split-layout-context.js';
import { splitLayoutAttrs } from './split-layout-attrs.js';

/**
 * Configuration options for SplitLayoutPaneState.
 * Uses BoxedValues for reactive prop tracking.
 */
export interface SplitLayoutPaneStateOpts
	extends ReadableBoxedValues<{
		/** Id of the node this pane renders */
		id: string;

		/** Current path of the node, supplied by the renderer */
		path: NodePath;

		/** Caller-defined tag carried on the drag payload */
		kind: string;
	}> {}

export class SplitLayoutPaneState<TContent = unknown> {
	/**
	 * Create a pane state bound to the controller from SplitLayoutRootContext.
	 * Must be called during component initialisation.
	 */
	static create(opts: SplitLayoutPaneStateOpts): SplitLayoutPaneState {
		return new SplitLayoutPaneState(opts, SplitLayoutRootContext.get());
	}

	readonly opts: SplitLayoutPaneStateOpts;

	readonly controller: SplitLayoutController<TContent>;

	constructor(opts: SplitLayoutPaneStateOpts, controller: SplitLayoutController<TContent>) {
		this.opts = opts;
		this.controller = controller;
	}

	/** Drag payload for this pane, as a move from its current path */
	readonly dragItem: DragItem = $derived.by(() =>
		createDragItem(this.opts.id.current, this.opts.kind.current, this.opts.path.current)
	);

	readonly isDragging: boolean = $derived.by(
		() => this.controller.activeDragItem?.id === this.opts.id.current
	);

	/** The controller's preview when it targets this pane */
	readonly preview: DropPreview | null = $derived.by(() => {
		const preview = this.controller.preview;
		return preview !== null && preview.targetNodeId === this.opts.id.current ? preview : null;
	});

	readonly isDropTarget: boolean = $derived.by(() => this.preview !== null);

	/** Absolute-position CSS for the preview overlay, inside the pane */
	readonly previewStyle: string | undefined = $derived.by(() => {
		if (this.preview === null) return undefined;
		const { x, y, width, height } = this.preview.previewRect;
		return `position: absolute; left: ${x}px; top: ${y}px; width: ${width}px; height: ${height}px;`;
	});

	readonly props = $derived.by(() => ({
		[splitLayoutAttrs.pane]: '',
		'data-node-id': this.opts.id.current,
		'data-path': encodePath(this.opts.path.current),
		'data-dragging': boolToEmptyStrOrUndef(this.isDragging),
		'data-drop-zone': this.preview?.zone,
		'data-drop-action': this.preview?.action,
		'data-edit-mode': boolToStr(this.controller.editMode)
	}));

	readonly previewProps = $derived.by(() => {
		if (this.preview === null) return null;
		return {
			[splitLayoutAttrs.preview]: '',
			'data-drop-zone': this.preview.zone,
			'data-drop-action': this.preview.action,
			style: this.previewStyle
		};
	});

	// ===== Event Handlers =====

	handleDragStart(): boolean {
		return this.controller.onDragStart(this.dragItem);
	}

	handleDragEnd(): void {
		this.controller.onDragEnd();
	}

	/**
	 * Forward a hover tick in pane-local coordinates.
	 */
	handleHover(localPos: Point, paneSize: Size): boolean {
		return this.controller.onHoverUpdate(
			localPos,
			paneSize,
			this.opts.id.current,
			this.opts.path.current
		);
	}

	/**
	 * Forward a hover tick from viewport coordinates and the pane's bounding rect.
	 */
	handlePointerMove(client: Point, bounds: Rect): boolean {
		return this.handleHover(
			{ x: client.x - bounds.x, y: client.y - bounds.y },
			{ width: bounds.width, height: bounds.height }
		);
	}

	/**
	 * Pointer left the pane: drop the preview if it targets this pane.
	 */
	handleLeave(): boolean {
		if (this.preview === null) return false;
		return this.controller.clearPreview();
	}

	/**
	 * A drag item was released over this pane.
	 */
	handleDrop(draggedItem: DragItem, buildNewNode?: NodeBuilder<TContent>): boolean {
		return this.controller.onDrop(draggedItem, buildNewNode);
	}
}
