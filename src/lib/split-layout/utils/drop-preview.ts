/**
 * Drop preview and drag item value helpers.
 */

import type {
	DragItem,
	DropAction,
	DropPreview,
	DropZone,
	EdgeZone,
	NodePath,
	Rect,
	SplitAxis
} from '../types/index.js';
import { pathsEqual } from '../state/path-utils.js';

export function isEdgeZone(zone: DropZone): zone is EdgeZone {
	return zone !== 'center';
}

export function zoneAction(zone: DropZone): DropAction {
	return isEdgeZone(zone) ? 'split' : 'replace';
}

export function edgeZoneAxis(zone: EdgeZone): SplitAxis {
	return zone === 'left' || zone === 'right' ? 'horizontal' : 'vertical';
}

export function zoneSplitAxis(zone: DropZone): SplitAxis | null {
	return zone === 'center' ? null : edgeZoneAxis(zone);
}

export function zoneInsertsBefore(zone: DropZone): boolean {
	return zone === 'left' || zone === 'top';
}

export interface CreatePreviewParams {
	targetNodeId: string;
	targetPath: NodePath;
	zone: DropZone;
	previewRect: Rect;
	paneRect: Rect;
}

/**
 * Build a preview value, deriving action, split axis and insert position from the zone.
 */
export function createPreview(params: CreatePreviewParams): DropPreview {
	const { zone } = params;
	const base = {
		targetNodeId: params.targetNodeId,
		targetPath: [...params.targetPath],
		previewRect: { ...params.previewRect },
		paneRect: { ...params.paneRect }
	};

	if (zone === 'center') {
		return { ...base, zone, action: 'replace', splitAxis: null, insertBefore: false };
	}
	return {
		...base,
		zone,
		action: 'split',
		splitAxis: edgeZoneAxis(zone),
		insertBefore: zoneInsertsBefore(zone)
	};
}

export function rectsEqual(a: Rect, b: Rect): boolean {
	return a.x === b.x && a.y === b.y && a.width === b.width && a.height === b.height;
}

/**
 * Value equality over the stored fields. Derived fields follow from `zone`.
 */
export function previewsEqual(a: DropPreview | null, b: DropPreview | null): boolean {
	if (a === b) return true;
	if (a === null || b === null) return false;
	return (
		a.targetNodeId === b.targetNodeId &&
		a.zone === b.zone &&
		pathsEqual(a.targetPath, b.targetPath) &&
		rectsEqual(a.previewRect, b.previewRect) &&
		rectsEqual(a.paneRect, b.paneRect)
	);
}

/**
 * Create a drag payload. Omit `originalPath` for externally-sourced items.
 */
export function createDragItem(id: string, kind: string, originalPath: NodePath = []): DragItem {
	return { id, kind, originalPath: [...originalPath] };
}

/**
 * Whether the drag relocates an existing node rather than inserting a new one.
 */
export function isMoveDrag(item: DragItem): boolean {
	return item.originalPath.length > 0;
}

export function dragItemsEqual(a: DragItem | null, b: DragItem | null): boolean {
	if (a === b) return true;
	if (a === null || b === null) return false;
	return a.id === b.id && a.kind === b.kind && pathsEqual(a.originalPath, b.originalPath);
}
