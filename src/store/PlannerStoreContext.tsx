import React, { createContext, useRef, useContext } from 'react';
import { useStore } from 'zustand';
import { PlannerState } from './types';
import { createPlannerStore, type PlannerStore, type PlannerStoreOptions } from './createPlannerStore';

const PlannerStoreContext = createContext<PlannerStore | null>(null);

interface PlannerStoreProviderProps {
    children: React.ReactNode;
    store?: PlannerStore;
    options?: PlannerStoreOptions;
}

/**
 * Owns the planning session for the component tree below it.
 */
export const PlannerStoreProvider = ({ children, store, options }: PlannerStoreProviderProps) => {
    const storeRef = useRef<PlannerStore | null>(null);
    if (!storeRef.current) {
        storeRef.current = store || createPlannerStore(options);
    }

    return (
        <PlannerStoreContext.Provider value={storeRef.current}>
            {children}
        </PlannerStoreContext.Provider>
    );
};

export const usePlannerStoreContext = () => {
    const store = useContext(PlannerStoreContext);
    if (!store) {
        throw new Error('usePlannerStore must be used within a PlannerStoreProvider');
    }
    return store;
};

export function usePlannerStore<T>(selector: (state: PlannerState) => T): T {
    return useStore(usePlannerStoreContext(), selector);
}
