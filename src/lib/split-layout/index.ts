/**
 * SplitLayout - Drag and Drop Split Pane Layouts
 *
 * Headless building blocks for IDE-style panel arrangement:
 * - Immutable layout tree with path-addressed transforms
 * - Hover zone classification (split left/right/top/bottom, replace center)
 * - Controller sequencing drag start, hover and drop into tree mutations
 * - Pane state with reactive data attributes and preview geometry
 */

// Core types
export * from './types/index.js';

// Utilities
export * from './utils/index.js';

// State management
export * from './state/index.js';

// Component API
export * from './components/index.js';
