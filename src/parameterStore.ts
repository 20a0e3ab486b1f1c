// Parameter store - live ParameterSet with change notification
// Engines and drivers read through getParameters() so every query sees the latest values

import { createStore, type Mutate, type StoreApi } from 'zustand/vanilla';
import { subscribeWithSelector } from 'zustand/middleware';
import type { ParameterSet } from './types';
import { createParameterSet } from './parameters';
import { Logger } from './logger';

const log = Logger.create('ParameterStore');

export interface ParameterStoreState {
  params: Readonly<ParameterSet>;

  // Actions
  /** Merge, validate and publish; throws ParameterValidationError and leaves state untouched */
  setParams: (patch: Partial<ParameterSet>) => void;
  reset: () => void;
}

export type ParameterStore = Mutate<StoreApi<ParameterStoreState>, [['zustand/subscribeWithSelector', never]]>;

export function createParameterStore(initial: Partial<ParameterSet> = {}): ParameterStore {
  const initialParams = createParameterSet(initial);

  return createStore<ParameterStoreState>()(
    subscribeWithSelector((set, get) => ({
      params: initialParams,

      setParams: (patch: Partial<ParameterSet>) => {
        const next = createParameterSet({ ...get().params, ...patch });
        log.debug('Parameters updated', patch);
        set({ params: next });
      },

      reset: () => {
        set({ params: initialParams });
      },
    }))
  );
}

/** Getter suitable as a ParameterSource */
export function getParameters(store: ParameterStore): () => ParameterSet {
  return () => store.getState().params;
}
