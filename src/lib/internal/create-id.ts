/**
 * Id-generation capability injected into tree operations that mint new nodes.
 */
export type IdGenerator = () => string;

/**
 * Creates an isolated, deterministic id generator.
 *
 * Each generator keeps its own counter, so two controllers never share a
 * sequence and tests can predict the ids they will see.
 *
 * @example
 * ```typescript
 * const nextId = createIdGenerator('branch');
 * nextId(); // 'split-branch-1'
 * nextId(); // 'split-branch-2'
 * ```
 */
export function createIdGenerator(prefix: string): IdGenerator {
	let sequence = 0;
	return () => `split-${prefix}-${++sequence}`;
}
