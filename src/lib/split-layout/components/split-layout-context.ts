/**
 * Split Layout Context
 *
 * Shares the SplitLayoutController between the root component and its panes.
 * Uses runed's Context for type-safe parent-child state injection.
 */

import { Context } from 'runed';
import type { SplitLayoutController } from '../state/split-layout-controller.svelte.js';

export const SplitLayoutRootContext = new Context<SplitLayoutController>('SplitLayout.Root');
