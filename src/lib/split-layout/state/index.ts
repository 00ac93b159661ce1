/**
 * Split Layout State
 *
 * Tree model, move path adjustment and the drag and drop controller.
 */

export { SplitLayoutController } from './split-layout-controller.svelte.js';
export type {
	SplitLayoutChangeDetail,
	SplitLayoutControllerOptions,
	SplitLayoutPhase,
	DropOutcome,
	NodeBuilder
} from './split-layout-controller.svelte.js';

export {
	createLeaf,
	createBranch,
	createInitialLayout,
	withFlex,
	findPath,
	nodeAt,
	replaceAt,
	insertAt,
	removeAt,
	wrapInBranch,
	nodesEqual,
	traverseTree,
	collectLeaves,
	countNodes
} from './layout-tree.js';

export { adjustPathAfterWrap, adjustPathAfterReplace } from './path-adjustment.js';
export { pathsEqual, isDescendantPath, isAncestorPath, areSiblingPaths } from './path-utils.js';
