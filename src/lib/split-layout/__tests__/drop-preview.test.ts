import { describe, it, expect } from 'vitest';
import {
	createDragItem,
	createPreview,
	dragItemsEqual,
	edgeZoneAxis,
	isEdgeZone,
	isMoveDrag,
	previewsEqual,
	rectsEqual,
	zoneAction,
	zoneInsertsBefore,
	zoneSplitAxis
} from '../utils/drop-preview.js';
import type { CreatePreviewParams } from '../utils/drop-preview.js';

const params: CreatePreviewParams = {
	targetNodeId: 'B',
	targetPath: [1],
	zone: 'top',
	previewRect: { x: 0, y: 0, width: 100, height: 40 },
	paneRect: { x: 0, y: 0, width: 100, height: 80 }
};

describe('zone helpers', () => {
	it('derives action and axis from the zone', () => {
		expect(zoneAction('left')).toBe('split');
		expect(zoneAction('center')).toBe('replace');
		expect(zoneSplitAxis('right')).toBe('horizontal');
		expect(zoneSplitAxis('bottom')).toBe('vertical');
		expect(zoneSplitAxis('center')).toBeNull();
		expect(edgeZoneAxis('top')).toBe('vertical');
	});

	it('inserts before the target for left and top only', () => {
		expect(zoneInsertsBefore('left')).toBe(true);
		expect(zoneInsertsBefore('top')).toBe(true);
		expect(zoneInsertsBefore('right')).toBe(false);
		expect(zoneInsertsBefore('bottom')).toBe(false);
		expect(zoneInsertsBefore('center')).toBe(false);
	});

	it('isEdgeZone', () => {
		expect(isEdgeZone('bottom')).toBe(true);
		expect(isEdgeZone('center')).toBe(false);
	});
});

describe('createPreview', () => {
	it('derives the split fields', () => {
		const preview = createPreview(params);
		expect(preview.action).toBe('split');
		expect(preview.splitAxis).toBe('vertical');
		expect(preview.insertBefore).toBe(true);
	});

	it('derives the replace fields', () => {
		const preview = createPreview({ ...params, zone: 'center' });
		expect(preview).toMatchObject({ action: 'replace', splitAxis: null, insertBefore: false });
	});

	it('copies the path and rects', () => {
		const targetPath = [0, 2];
		const previewRect = { x: 1, y: 2, width: 3, height: 4 };
		const preview = createPreview({ ...params, targetPath, previewRect });
		targetPath.push(9);
		previewRect.width = 99;
		expect(preview.targetPath).toEqual([0, 2]);
		expect(preview.previewRect.width).toBe(3);
	});
});

describe('previewsEqual', () => {
	it('compares by value', () => {
		expect(previewsEqual(createPreview(params), createPreview(params))).toBe(true);
		expect(previewsEqual(null, null)).toBe(true);
		expect(previewsEqual(createPreview(params), null)).toBe(false);
	});

	it('detects a change in any stored field', () => {
		const base = createPreview(params);
		expect(previewsEqual(base, createPreview({ ...params, targetNodeId: 'C' }))).toBe(false);
		expect(previewsEqual(base, createPreview({ ...params, zone: 'bottom' }))).toBe(false);
		expect(previewsEqual(base, createPreview({ ...params, targetPath: [2] }))).toBe(false);
		expect(
			previewsEqual(base, createPreview({ ...params, previewRect: { x: 0, y: 0, width: 100, height: 41 } }))
		).toBe(false);
		expect(
			previewsEqual(base, createPreview({ ...params, paneRect: { x: 0, y: 0, width: 100, height: 81 } }))
		).toBe(false);
	});

	it('rectsEqual', () => {
		expect(rectsEqual({ x: 1, y: 2, width: 3, height: 4 }, { x: 1, y: 2, width: 3, height: 4 })).toBe(true);
		expect(rectsEqual({ x: 1, y: 2, width: 3, height: 4 }, { x: 1, y: 2, width: 3, height: 5 })).toBe(false);
	});
});

describe('drag items', () => {
	it('defaults to an external item with an empty path', () => {
		const item = createDragItem('new-pane', 'editor');
		expect(item).toEqual({ id: 'new-pane', kind: 'editor', originalPath: [] });
		expect(isMoveDrag(item)).toBe(false);
	});

	it('treats a non-empty original path as a move', () => {
		expect(isMoveDrag(createDragItem('A', 'editor', [0]))).toBe(true);
	});

	it('compares by value', () => {
		const a = createDragItem('A', 'editor', [0, 1]);
		expect(dragItemsEqual(a, createDragItem('A', 'editor', [0, 1]))).toBe(true);
		expect(dragItemsEqual(a, createDragItem('A', 'terminal', [0, 1]))).toBe(false);
		expect(dragItemsEqual(a, createDragItem('A', 'editor', [0]))).toBe(false);
		expect(dragItemsEqual(a, null)).toBe(false);
		expect(dragItemsEqual(null, null)).toBe(true);
	});
});
