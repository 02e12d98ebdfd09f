import { StateCreator } from 'zustand';
import { toast } from 'sonner';
import { InvalidParameterError, fail, ok } from '../../lib/errors';
import {
    FenestrationRegistry,
    describeFenestration,
    fenestrationLabel,
    validateFenestration,
} from '../../lib/fenestration';
import { logger } from '../../lib/utils/Logger';
import { PlannerState, FenestrationSlice } from '../types';

export const createFenestrationSlice: StateCreator<
    PlannerState,
    [],
    [],
    FenestrationSlice
> = (set, get) => ({
    registry: FenestrationRegistry.empty(),
    lastRejection: null,

    addFenestration: (request) => {
        const { graft, registry, config } = get();
        if (!graft) {
            const error = new InvalidParameterError('device', 'Select a graft before adding fenestrations');
            set({ lastRejection: error });
            toast.error(error.message);
            return fail(error);
        }

        const validated = validateFenestration(request, graft, config);
        if (!validated.ok) {
            logger.warn('fenestration', `Rejected: ${validated.error.message}`, request);
            set({ lastRejection: validated.error });
            toast.error(validated.error.message);
            return validated;
        }

        const added = registry.add(validated.value);
        if (!added.ok) {
            logger.warn('fenestration', `Rejected: ${added.error.message}`);
            set({ lastRejection: added.error });
            toast.error(added.error.message);
            return added;
        }

        set({ registry: added.value, lastRejection: null });
        const index = added.value.size - 1;
        logger.info('fenestration', `Added ${describeFenestration(index, validated.value)}`);
        toast.success(`${fenestrationLabel(index)} added`);
        return ok(validated.value);
    },

    removeFenestration: (index) => {
        const { registry } = get();
        const removed = registry.get(index);
        const result = registry.remove(index);
        if (!result.ok || !removed) {
            const error = result.ok
                ? new InvalidParameterError('index', `No fenestration at index ${index}`)
                : result.error;
            logger.warn('fenestration', error.message);
            set({ lastRejection: error });
            return fail(error);
        }

        set({ registry: result.value, lastRejection: null });
        logger.info('fenestration', `Removed ${describeFenestration(index, removed)}`);
        return ok(removed);
    },

    clearFenestrations: () => {
        const count = get().registry.size;
        set(state => ({ registry: state.registry.clear(), lastRejection: null }));
        logger.info('fenestration', `Cleared ${count} fenestration(s)`);
    },

    describeLayout: () => get().registry.toArray().map((fenestration, index) => describeFenestration(index, fenestration)),
});
