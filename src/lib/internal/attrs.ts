/**
 * Data attribute utilities for headless components
 */

export function boolToStr(condition: boolean): 'true' | 'false' {
	return condition ? 'true' : 'false';
}

export function boolToEmptyStrOrUndef(condition: boolean): '' | undefined {
	return condition ? '' : undefined;
}

export type LayoutAttrsConfig<T extends readonly string[]> = {
	component: string;
	parts: T;
};

export type CreateLayoutAttrsReturn<T extends readonly string[]> = {
	readonly [K in T[number]]: string;
} & {
	selector: (part: T[number]) => string;
	getAttr: (part: T[number]) => string;
};

export function createLayoutAttrs<const T extends readonly string[]>(
	config: LayoutAttrsConfig<T>
): CreateLayoutAttrsReturn<T> {
	const prefix = `data-${config.component}-`;
	const getAttr = (part: T[number]): string => `${prefix}${part}`;
	const selector = (part: T[number]): string => `[${getAttr(part)}]`;

	const attrs: Record<string, string> = {};
	for (const part of config.parts) {
		attrs[part] = getAttr(part);
	}

	return Object.assign(attrs, { selector, getAttr }) as CreateLayoutAttrsReturn<T>;
}
