import { describe, it, expect } from 'vitest';
import { decodePath, encodePath, getFlexPercentages } from '../utils/layout-rendering.js';
import { createBranch } from '../state/layout-tree.js';
import { leaf } from './fixtures.js';

describe('getFlexPercentages', () => {
	it('normalizes child flex to percentages', () => {
		const branch = createBranch('r', 'horizontal', [leaf('a'), leaf('b'), leaf('c', 2)]);
		expect(getFlexPercentages(branch)).toEqual([25, 25, 50]);
	});

	it('returns 100 for a single child', () => {
		expect(getFlexPercentages(createBranch('r', 'vertical', [leaf('a', 3)]))).toEqual([100]);
	});
});

describe('path encoding', () => {
	it('encodes paths as comma-separated indices', () => {
		expect(encodePath([])).toBe('');
		expect(encodePath([0, 2, 1])).toBe('0,2,1');
	});

	it('decodes encoded paths', () => {
		expect(decodePath('')).toEqual([]);
		expect(decodePath('0,2,1')).toEqual([0, 2, 1]);
	});

	it('rejects malformed segments', () => {
		expect(decodePath('0,x')).toBeUndefined();
		expect(decodePath('-1')).toBeUndefined();
		expect(decodePath('1.5')).toBeUndefined();
		expect(decodePath('0,,1')).toBeUndefined();
	});
});
