/**
 * Split Layout Error Handling Types
 *
 * Call-time failures are returned as Result values and never thrown.
 * Programming errors (bad configuration, reentrant mutation) throw
 * LayoutPreconditionError.
 */

import type { NodePath } from './types.js';

/**
 * Discriminated union for drop failures.
 * Enables exhaustive error handling with type safety.
 */
export type DropError =
	| { type: 'edit-mode-disabled' }
	| { type: 'no-preview' }
	| { type: 'self-drop'; id: string }
	| { type: 'target-inside-source'; sourcePath: NodePath; targetPath: NodePath }
	| { type: 'missing-node'; id: string; path: NodePath }
	| { type: 'cancelled'; id: string };

/**
 * Result type for explicit error handling.
 */
export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

/**
 * Helper to create a successful result
 */
export function Ok<T>(value: T): Result<T, never> {
	return { ok: true, value };
}

/**
 * Helper to create an error result
 */
export function Err<E>(error: E): Result<never, E> {
	return { ok: false, error };
}

/**
 * Codes for precondition violations.
 * - invalid-config: an option is out of its allowed range
 * - invalid-node: a node constructor received an invalid id, flex or child list
 * - layout-in-progress: a mutation was attempted while another one is running
 */
export type LayoutPreconditionCode = 'invalid-config' | 'invalid-node' | 'layout-in-progress';

/**
 * Thrown for programming errors. These are not recoverable at call time.
 *
 * @example
 * ```typescript
 * try {
 *   new HoverZoneClassifier({ edgeThreshold: 0.8 });
 * } catch (error) {
 *   if (error instanceof LayoutPreconditionError && error.code === 'invalid-config') {
 *     console.error(error.message);
 *   }
 * }
 * ```
 */
export class LayoutPreconditionError extends Error {
	readonly code: LayoutPreconditionCode;

	constructor(code: LayoutPreconditionCode, message: string) {
		super(message);
		this.name = 'LayoutPreconditionError';
		this.code = code;
	}
}
