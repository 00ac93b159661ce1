/**
 * Internal Utilities
 *
 * Low-level utilities shared by the split layout state and component layers.
 */

// Data attributes and styling
export { createLayoutAttrs, boolToStr, boolToEmptyStrOrUndef } from './attrs.js';
export type { CreateLayoutAttrsReturn, LayoutAttrsConfig } from './attrs.js';

// Identifiers
export { createIdGenerator } from './create-id.js';
export type { IdGenerator } from './create-id.js';

// Event utilities
export { CustomEventDispatcher } from './events.js';
export type { EventCallback } from './events.js';

// Re-export from svelte-toolbelt for convenience
export type { ReadableBoxedValues } from 'svelte-toolbelt';
