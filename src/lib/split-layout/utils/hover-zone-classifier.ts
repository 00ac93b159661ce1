/**
 * Hover Zone Classifier
 *
 * Maps a pointer position inside a pane to a drop zone and the rectangle the
 * drop preview should cover. Stateless once constructed.
 */

import {
	LayoutPreconditionError,
	type DropPreview,
	type DropZone,
	type NodePath,
	type Point,
	type Rect,
	type Size
} from '../types/index.js';
import { createPreview } from './drop-preview.js';

export interface HoverZoneClassifierOptions {
	/**
	 * Fraction of each dimension counted as an edge zone, in (0, 0.5].
	 * @default 0.2
	 */
	edgeThreshold?: number;

	/**
	 * Fraction of the pane's matching dimension covered by a split preview, in (0, 1].
	 * @default 0.5
	 */
	previewSizeRatio?: number;

	/**
	 * Inset in pixels applied on every side of the pane for the center (replace) preview.
	 * @default 4
	 */
	centerInset?: number;
}

export const DEFAULT_CLASSIFIER_OPTIONS: Readonly<Required<HoverZoneClassifierOptions>> = Object.freeze({
	edgeThreshold: 0.2,
	previewSizeRatio: 0.5,
	centerInset: 4
});

function assertRange(name: string, value: number, min: number, max: number, minInclusive: boolean): void {
	const aboveMin = minInclusive ? value >= min : value > min;
	if (!Number.isFinite(value) || !aboveMin || value > max) {
		const open = minInclusive ? '[' : '(';
		throw new LayoutPreconditionError(
			'invalid-config',
			`${name} must be in ${open}${min}, ${max}], got ${value}`
		);
	}
}

export class HoverZoneClassifier {
	readonly edgeThreshold: number;
	readonly previewSizeRatio: number;
	readonly centerInset: number;

	/**
	 * @throws LayoutPreconditionError when an option is out of range
	 */
	constructor(options: HoverZoneClassifierOptions = {}) {
		const resolved = {
			edgeThreshold: options.edgeThreshold ?? DEFAULT_CLASSIFIER_OPTIONS.edgeThreshold,
			previewSizeRatio: options.previewSizeRatio ?? DEFAULT_CLASSIFIER_OPTIONS.previewSizeRatio,
			centerInset: options.centerInset ?? DEFAULT_CLASSIFIER_OPTIONS.centerInset
		};
		assertRange('edgeThreshold', resolved.edgeThreshold, 0, 0.5, false);
		assertRange('previewSizeRatio', resolved.previewSizeRatio, 0, 1, false);
		assertRange('centerInset', resolved.centerInset, 0, Number.MAX_SAFE_INTEGER, true);

		this.edgeThreshold = resolved.edgeThreshold;
		this.previewSizeRatio = resolved.previewSizeRatio;
		this.centerInset = resolved.centerInset;
	}

	/**
	 * Classify a pane-local pointer position.
	 *
	 * In a corner the axis whose nearest edge is closer wins, with ties going
	 * to the horizontal axis. A pane without area has no edges.
	 */
	classify(localPos: Point, paneSize: Size): DropZone {
		if (paneSize.width <= 0 || paneSize.height <= 0) return 'center';

		const rx = localPos.x / paneSize.width;
		const ry = localPos.y / paneSize.height;
		const t = this.edgeThreshold;

		const inEdgeZone = rx < t || rx > 1 - t || ry < t || ry > 1 - t;
		if (!inEdgeZone) return 'center';

		const toLeft = rx;
		const toRight = 1 - rx;
		const toTop = ry;
		const toBottom = 1 - ry;

		const minHorizontal = Math.min(toLeft, toRight);
		const minVertical = Math.min(toTop, toBottom);

		if (minHorizontal <= minVertical) {
			return toLeft < toRight ? 'left' : 'right';
		}
		return toTop < toBottom ? 'top' : 'bottom';
	}

	/**
	 * Rectangle the preview overlay covers for `zone` inside `paneRect`.
	 */
	previewRect(zone: DropZone, paneRect: Rect): Rect {
		const { x, y, width, height } = paneRect;
		const previewWidth = width * this.previewSizeRatio;
		const previewHeight = height * this.previewSizeRatio;

		switch (zone) {
			case 'left':
				return { x, y, width: previewWidth, height };
			case 'right':
				return { x: x + width - previewWidth, y, width: previewWidth, height };
			case 'top':
				return { x, y, width, height: previewHeight };
			case 'bottom':
				return { x, y: y + height - previewHeight, width, height: previewHeight };
			case 'center': {
				const inset = this.centerInset;
				return {
					x: x + inset,
					y: y + inset,
					width: Math.max(0, width - inset * 2),
					height: Math.max(0, height - inset * 2)
				};
			}
		}
	}

	/**
	 * Classify the position and assemble the full preview value.
	 */
	buildPreview(localPos: Point, paneSize: Size, targetId: string, targetPath: NodePath): DropPreview {
		const zone = this.classify(localPos, paneSize);
		const paneRect: Rect = { x: 0, y: 0, width: paneSize.width, height: paneSize.height };
		return createPreview({
			targetNodeId: targetId,
			targetPath,
			zone,
			previewRect: this.previewRect(zone, paneRect),
			paneRect
		});
	}
}
