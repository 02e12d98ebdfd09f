import { create } from 'zustand';
import { PlannerState } from './types';
import { createGraftSlice } from './slices/graftSlice';
import { createFenestrationSlice } from './slices/fenestrationSlice';
import { createRenderSlice } from './slices/renderSlice';
import { buildInitialPatch, type PlannerStoreOptions } from './initialState';

export * from './types';
export type { PlannerStoreOptions } from './initialState';

/**
 * One store per planning session. Nothing is shared between stores, so
 * concurrent sessions cannot see each other's graft or layout.
 */
export const createPlannerStore = (options: PlannerStoreOptions = {}) => create<PlannerState>((...a) => ({
    ...createGraftSlice(...a),
    ...createFenestrationSlice(...a),
    ...createRenderSlice(...a),
    ...buildInitialPatch(options),
}));

export type PlannerStore = ReturnType<typeof createPlannerStore>;
