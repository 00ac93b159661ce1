/**
 * Split Layout Component Attributes
 *
 * Data attribute generators for split-layout component parts.
 * Provides consistent CSS selector patterns.
 */

import { createLayoutAttrs } from '../../internal/index.js';

export const splitLayoutAttrs = createLayoutAttrs({
	component: 'split-layout',
	parts: ['root', 'branch', 'pane', 'preview']
});
