import { StateCreator } from 'zustand';
import { toast } from 'sonner';
import { DEVICE_CATALOG, GraftSpecification, graftFromDevice } from '../../lib/graft';
import { logger } from '../../lib/utils/Logger';
import { PlannerState, GraftSlice } from '../types';

export const createGraftSlice: StateCreator<
    PlannerState,
    [],
    [],
    GraftSlice
> = (set, get) => ({
    catalog: DEVICE_CATALOG,
    graft: null,
    deviceKey: null,

    selectDevice: (key) => {
        const result = graftFromDevice(key, get().catalog);
        if (!result.ok) {
            logger.warn('graft', result.error.message);
            toast.error(result.error.message);
            return result;
        }

        const graft = result.value;
        const hadLayout = !get().registry.isEmpty;
        // Distance and size bounds are device specific, so the layout goes too
        set(state => ({
            graft,
            deviceKey: key,
            registry: state.registry.clear(),
            lastRejection: null,
        }));
        logger.info('graft', `Selected ${graft.describe()}`);
        if (hadLayout) {
            toast.info('Device changed: planned fenestrations were cleared');
        }
        return result;
    },

    selectCustomGraft: (diameterMm, lengthMm, name) => {
        const result = GraftSpecification.create(
            diameterMm,
            lengthMm,
            name ?? `Custom ${diameterMm} × ${lengthMm} mm`,
        );
        if (!result.ok) {
            logger.warn('graft', result.error.message);
            toast.error(result.error.message);
            return result;
        }

        const graft = result.value;
        const hadLayout = !get().registry.isEmpty;
        set(state => ({
            graft,
            deviceKey: null,
            registry: state.registry.clear(),
            lastRejection: null,
        }));
        logger.info('graft', `Selected ${graft.describe()}`);
        if (hadLayout) {
            toast.info('Graft changed: planned fenestrations were cleared');
        }
        return result;
    },
});
