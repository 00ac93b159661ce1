/**
 * SplitLayoutController - Drag and Drop Layout State Manager
 *
 * Owns the layout tree and the drag state, and turns drag lifecycle calls
 * (drag start, hover, drop, cancel) into tree mutations.
 * Uses Svelte 5 runes for renderer reactivity and a CustomEventDispatcher for
 * explicit change notifications.
 *
 * Lifecycle:
 * - idle: no active drag
 * - dragging: a drag item is active
 * - previewing: dragging with a pending drop preview
 *
 * Edit mode is an orthogonal gate: with edit mode off, drag start, hover and
 * drop calls are no-ops.
 */

import {
	createIdGenerator,
	CustomEventDispatcher,
	type EventCallback,
	type IdGenerator
} from '../../internal/index.js';
import {
	Err,
	LayoutPreconditionError,
	Ok,
	type BranchNode,
	type DragItem,
	type DropAction,
	type DropError,
	type DropPreview,
	type LayoutNode,
	type NodePath,
	type Point,
	type ReplaceDropPreview,
	type Result,
	type Size,
	type SplitDropPreview
} from '../types/index.js';
import {
	HoverZoneClassifier,
	type HoverZoneClassifierOptions
} from '../utils/hover-zone-classifier.js';
import { isMoveDrag, previewsEqual } from '../utils/drop-preview.js';
import {
	findPath,
	insertAt,
	nodeAt,
	removeAt,
	replaceAt,
	withFlex,
	wrapInBranch
} from './layout-tree.js';
import { adjustPathAfterReplace, adjustPathAfterWrap } from './path-adjustment.js';
import { isDescendantPath, pathsEqual } from './path-utils.js';

/**
 * Layout change event detail types
 */
export type SplitLayoutChangeDetail =
	| { type: 'edit-mode-changed'; editMode: boolean }
	| { type: 'drag-started'; item: DragItem }
	| { type: 'preview-changed'; preview: DropPreview | null }
	| { type: 'drag-ended' }
	| { type: 'drop-applied'; action: DropAction; targetPath: NodePath; removedSourcePath: NodePath | null }
	| { type: 'root-replaced' }
	| { type: 'node-removed'; path: NodePath }
	| { type: 'node-inserted'; parentPath: NodePath; index: number }
	| { type: 'flexes-synced'; branchId: string };

export type SplitLayoutPhase = 'idle' | 'dragging' | 'previewing';

/**
 * Lazily builds the node a drop inserts. Called once, after the drop guards pass.
 * Returning null cancels the drop.
 */
export type NodeBuilder<TContent> = (
	draggedItem: DragItem,
	preview: DropPreview
) => LayoutNode<TContent> | null;

export interface SplitLayoutControllerOptions {
	/** Classifier instance, or options for the default one */
	classifier?: HoverZoneClassifier | HoverZoneClassifierOptions;

	/**
	 * Initial edit mode.
	 * @default true
	 */
	editMode?: boolean;

	/** Id source for branches created by split drops */
	createBranchId?: IdGenerator;

	/**
	 * Log drops and best-effort fallbacks to the console.
	 * @default false
	 */
	debug?: boolean;
}

export interface DropOutcome<TContent> {
	action: DropAction;

	/** Root after the drop */
	root: LayoutNode<TContent>;

	/** Path the moved node was removed from, in the post-transform tree; null when nothing was removed */
	removedSourcePath: NodePath | null;
}

/** Placeholder until the constructor assigns the caller's root. Never observable. */
const UNSET_ROOT: BranchNode<never> = { type: 'branch', id: '', axis: 'horizontal', children: [], flex: 1 };

export class SplitLayoutController<TContent = unknown> {
	/**
	 * Change event dispatcher for renderer callbacks.
	 * Fires whenever root, preview, activeDragItem or editMode changes.
	 */
	readonly changeEvent = new CustomEventDispatcher<SplitLayoutChangeDetail>('splitlayoutchange');

	readonly classifier: HoverZoneClassifier;

	// ===== Reactive State =====

	/**
	 * Layout tree. $state.raw: nodes are immutable and replaced wholesale,
	 * so deep proxies would only break reference sharing.
	 */
	#root = $state.raw<LayoutNode<TContent>>(UNSET_ROOT);

	#preview = $state.raw<DropPreview | null>(null);

	#activeDragItem = $state.raw<DragItem | null>(null);

	#editMode = $state(true);

	/**
	 * Reentrancy guard. Set while a drop runs the caller's node builder.
	 */
	#busy = false;

	readonly #createBranchId: IdGenerator;

	readonly #debug: boolean;

	constructor(root: LayoutNode<TContent>, options: SplitLayoutControllerOptions = {}) {
		this.#root = root;
		this.#editMode = options.editMode ?? true;
		this.classifier =
			options.classifier instanceof HoverZoneClassifier
				? options.classifier
				: new HoverZoneClassifier(options.classifier);
		this.#createBranchId = options.createBranchId ?? createIdGenerator('branch');
		this.#debug = options.debug ?? false;
	}

	// ===== Public Getters =====

	get root(): LayoutNode<TContent> {
		return this.#root;
	}

	get preview(): DropPreview | null {
		return this.#preview;
	}

	get activeDragItem(): DragItem | null {
		return this.#activeDragItem;
	}

	get editMode(): boolean {
		return this.#editMode;
	}

	// ===== Derived Values =====

	readonly phase: SplitLayoutPhase = $derived.by(() => {
		if (this.#activeDragItem === null) return 'idle';
		return this.#preview === null ? 'dragging' : 'previewing';
	});

	// ===== Change Notification =====

	/**
	 * Register a change listener. Returns the unsubscribe function.
	 */
	subscribe(listener: (detail: SplitLayoutChangeDetail) => void): () => void {
		const callback: EventCallback<SplitLayoutChangeDetail> = (event) => listener(event.detail);
		return this.changeEvent.listen(callback);
	}

	/**
	 * Release all listeners. Call when the owning view is torn down.
	 */
	destroy(): void {
		this.changeEvent.clear();
	}

	// ===== Edit Mode =====

	/**
	 * Enable or disable editing. Disabling clears any preview and active drag.
	 */
	setEditMode(value: boolean): void {
		this.#assertNotBusy('setEditMode');
		if (this.#editMode === value) return;

		this.#editMode = value;
		if (!value) {
			this.#preview = null;
			this.#activeDragItem = null;
		}
		this.#notify({ type: 'edit-mode-changed', editMode: value });
	}

	// ===== Drag Lifecycle =====

	/**
	 * Begin a drag. Returns false when edit mode is off.
	 */
	onDragStart(item: DragItem): boolean {
		this.#assertNotBusy('onDragStart');
		if (!this.#editMode) return false;

		this.#activeDragItem = item;
		this.#notify({ type: 'drag-started', item });
		return true;
	}

	/**
	 * Update the preview from a hover tick over a pane.
	 *
	 * Hovering the dragged node itself, or a node inside the dragged subtree,
	 * clears the preview. Otherwise listeners are notified only when the
	 * preview changed by value.
	 *
	 * @returns whether the preview changed
	 */
	onHoverUpdate(localPos: Point, paneSize: Size, targetId: string, targetPath: NodePath): boolean {
		this.#assertNotBusy('onHoverUpdate');
		const item = this.#activeDragItem;
		if (!this.#editMode || item === null) return false;

		if (targetId === item.id || this.#isInsideDraggedSubtree(item, targetPath)) {
			return this.clearPreview();
		}

		const next = this.classifier.buildPreview(localPos, paneSize, targetId, targetPath);
		if (previewsEqual(this.#preview, next)) return false;

		this.#preview = next;
		this.#notify({ type: 'preview-changed', preview: next });
		return true;
	}

	/**
	 * End the drag, dropped or cancelled. Always leaves the controller idle.
	 */
	onDragEnd(): void {
		this.#assertNotBusy('onDragEnd');
		this.#activeDragItem = null;
		this.#preview = null;
		this.#notify({ type: 'drag-ended' });
	}

	/**
	 * Clear the preview.
	 * @returns whether there was a preview to clear
	 */
	clearPreview(): boolean {
		this.#assertNotBusy('clearPreview');
		if (this.#preview === null) return false;

		this.#preview = null;
		this.#notify({ type: 'preview-changed', preview: null });
		return true;
	}

	/**
	 * Apply the pending preview. Boolean form of drop().
	 */
	onDrop(draggedItem: DragItem, buildNewNode?: NodeBuilder<TContent>): boolean {
		return this.drop(draggedItem, buildNewNode).ok;
	}

	/**
	 * Apply the pending preview to the tree.
	 *
	 * A split wraps the target in a new branch next to the dropped node; a
	 * replace substitutes the target, keeping its flex. For moves, the dragged
	 * node is then removed from its original slot, re-derived against the
	 * transformed tree.
	 *
	 * `buildNewNode` receives the dragged item and the preview, and may return
	 * null to cancel. When it is omitted, a move reuses the node found at the
	 * drag item's original path.
	 */
	drop(
		draggedItem: DragItem,
		buildNewNode?: NodeBuilder<TContent>
	): Result<DropOutcome<TContent>, DropError> {
		this.#assertNotBusy('drop');
		const preview = this.#preview;
		if (!this.#editMode) return Err({ type: 'edit-mode-disabled' });
		if (preview === null) return Err({ type: 'no-preview' });

		if (draggedItem.id === preview.targetNodeId) {
			this.clearPreview();
			return Err({ type: 'self-drop', id: draggedItem.id });
		}
		if (this.#isInsideDraggedSubtree(draggedItem, preview.targetPath)) {
			this.clearPreview();
			return Err({
				type: 'target-inside-source',
				sourcePath: draggedItem.originalPath,
				targetPath: preview.targetPath
			});
		}

		const materialized = this.#materialize(draggedItem, preview, buildNewNode);
		if (!materialized.ok) return materialized;
		const newNode = materialized.value;

		const outcome =
			preview.action === 'split'
				? this.#applySplitDrop(draggedItem, preview, newNode)
				: this.#applyReplaceDrop(draggedItem, preview, newNode);

		this.#root = outcome.root;
		this.#preview = null;
		this.#activeDragItem = null;
		this.#log(`Applied ${outcome.action} drop of "${draggedItem.id}"`, {
			targetPath: preview.targetPath,
			removedSourcePath: outcome.removedSourcePath
		});
		this.#notify({
			type: 'drop-applied',
			action: outcome.action,
			targetPath: preview.targetPath,
			removedSourcePath: outcome.removedSourcePath
		});
		return Ok(outcome);
	}

	// ===== Direct Tree Edits =====

	/**
	 * Replace the whole tree, e.g. after an external restore.
	 */
	updateRoot(newRoot: LayoutNode<TContent>): void {
		this.#assertNotBusy('updateRoot');
		if (newRoot === this.#root) return;

		this.#root = newRoot;
		this.#notify({ type: 'root-replaced' });
	}

	/**
	 * Remove the node at `path`.
	 * Returns false when the path is invalid or the removal would empty the tree.
	 */
	removeNode(path: NodePath): boolean {
		this.#assertNotBusy('removeNode');
		const result = removeAt(this.#root, path);
		if (result === null || result === this.#root) return false;

		this.#root = result;
		this.#notify({ type: 'node-removed', path });
		return true;
	}

	/**
	 * Insert `node` into the branch at `parentPath`.
	 * Returns false when the path is invalid or resolves to a leaf.
	 */
	insertNode(parentPath: NodePath, index: number, node: LayoutNode<TContent>): boolean {
		this.#assertNotBusy('insertNode');
		const result = insertAt(this.#root, parentPath, index, node);
		if (result === this.#root) return false;

		this.#root = result;
		this.#notify({ type: 'node-inserted', parentPath, index });
		return true;
	}

	/**
	 * Write sizes chosen in the split-view widget back into the tree.
	 * `flexes` holds one positive weight per child of the branch `branchId`.
	 * Returns false when the branch is unknown, the counts differ, a weight is
	 * not positive, or nothing changed.
	 */
	syncFlexes(branchId: string, flexes: readonly number[]): boolean {
		this.#assertNotBusy('syncFlexes');
		const path = findPath(this.#root, branchId);
		if (path === undefined) return false;

		const branch = nodeAt(this.#root, path);
		if (branch?.type !== 'branch' || branch.children.length !== flexes.length) return false;
		if (!flexes.every((flex) => Number.isFinite(flex) && flex > 0)) return false;

		const children = branch.children.map((child, i) => withFlex(child, flexes[i]));
		if (children.every((child, i) => child === branch.children[i])) return false;

		this.#root = replaceAt(this.#root, path, { ...branch, children });
		this.#notify({ type: 'flexes-synced', branchId });
		return true;
	}

	// ===== Lookups =====

	findPathById(nodeId: string): NodePath | undefined {
		return findPath(this.#root, nodeId);
	}

	getNodeAtPath(path: NodePath): LayoutNode<TContent> | undefined {
		return nodeAt(this.#root, path);
	}

	// ===== Drop Algorithms =====

	#applySplitDrop(
		item: DragItem,
		preview: SplitDropPreview,
		newNode: LayoutNode<TContent>
	): DropOutcome<TContent> {
		const root = this.#root;
		const wrapped = wrapInBranch(
			root,
			preview.targetPath,
			preview.splitAxis,
			newNode,
			preview.insertBefore,
			this.#createBranchId
		);

		// The source slot now holds the new wrapper, or the wrap resolved nothing
		if (!isMoveDrag(item) || wrapped === root || pathsEqual(item.originalPath, preview.targetPath)) {
			return { action: 'split', root: wrapped, removedSourcePath: null };
		}

		const sourcePath = adjustPathAfterWrap(item.originalPath, preview.targetPath, preview.insertBefore);
		return { action: 'split', ...this.#removeSource(wrapped, sourcePath) };
	}

	#applyReplaceDrop(
		item: DragItem,
		preview: ReplaceDropPreview,
		newNode: LayoutNode<TContent>
	): DropOutcome<TContent> {
		const root = this.#root;
		const preservedFlex = nodeAt(root, preview.targetPath)?.flex ?? 1;
		const replaced = replaceAt(root, preview.targetPath, withFlex(newNode, preservedFlex));

		if (!isMoveDrag(item) || replaced === root) {
			return { action: 'replace', root: replaced, removedSourcePath: null };
		}

		// A source at or below the target went away with the replaced subtree
		if (
			pathsEqual(item.originalPath, preview.targetPath) ||
			isDescendantPath(item.originalPath, preview.targetPath)
		) {
			return { action: 'replace', root: replaced, removedSourcePath: null };
		}

		const sourcePath = adjustPathAfterReplace(item.originalPath, preview.targetPath);
		return { action: 'replace', ...this.#removeSource(replaced, sourcePath) };
	}

	/**
	 * Best-effort removal of the moved node. Keeps `root` when the removal
	 * would empty the tree or the path no longer resolves.
	 */
	#removeSource(
		root: LayoutNode<TContent>,
		sourcePath: NodePath
	): { root: LayoutNode<TContent>; removedSourcePath: NodePath | null } {
		const removed = removeAt(root, sourcePath);
		if (removed === null || removed === root) {
			this.#log('Source removal skipped; keeping transformed tree', { sourcePath });
			return { root, removedSourcePath: null };
		}
		return { root: removed, removedSourcePath: sourcePath };
	}

	// ===== Helpers =====

	#materialize(
		item: DragItem,
		preview: DropPreview,
		buildNewNode: NodeBuilder<TContent> | undefined
	): Result<LayoutNode<TContent>, DropError> {
		if (buildNewNode === undefined) {
			const existing = isMoveDrag(item) ? nodeAt(this.#root, item.originalPath) : undefined;
			if (existing === undefined || existing.id !== item.id) {
				return Err({ type: 'missing-node', id: item.id, path: item.originalPath });
			}
			return Ok(existing);
		}

		let built: LayoutNode<TContent> | null;
		this.#busy = true;
		try {
			built = buildNewNode(item, preview);
		} finally {
			this.#busy = false;
		}
		return built === null ? Err({ type: 'cancelled', id: item.id }) : Ok(built);
	}

	#isInsideDraggedSubtree(item: DragItem, targetPath: NodePath): boolean {
		return isMoveDrag(item) && isDescendantPath(targetPath, item.originalPath);
	}

	#assertNotBusy(operation: string): void {
		if (this.#busy) {
			throw new LayoutPreconditionError(
				'layout-in-progress',
				`Cannot call ${operation}() while a drop is building its node`
			);
		}
	}

	#notify(detail: SplitLayoutChangeDetail): void {
		this.changeEvent.dispatch(detail);
	}

	#log(message: string, data?: Record<string, unknown>): void {
		if (!this.#debug) return;
		if (data === undefined) {
			console.log(`[SplitLayoutController] ${message}`);
		} else {
			console.log(`[SplitLayoutController] ${message}`, data);
		}
	}
}
