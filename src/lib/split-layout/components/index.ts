export { SplitLayoutPaneState } from './split-layout-pane-state.svelte.js';
export type { SplitLayoutPaneStateOpts } from './split-layout-pane-state.svelte.js';
export { SplitLayoutRootContext } from './split-layout-context.js';
export { splitLayoutAttrs } from './split-layout-attrs.js';
