export { HoverZoneClassifier, DEFAULT_CLASSIFIER_OPTIONS } from './hover-zone-classifier.js';
export type { HoverZoneClassifierOptions } from './hover-zone-classifier.js';

export {
	createPreview,
	previewsEqual,
	rectsEqual,
	isEdgeZone,
	zoneAction,
	zoneSplitAxis,
	edgeZoneAxis,
	zoneInsertsBefore,
	createDragItem,
	isMoveDrag,
	dragItemsEqual
} from './drop-preview.js';
export type { CreatePreviewParams } from './drop-preview.js';

export { getFlexPercentages, encodePath, decodePath } from './layout-rendering.js';
