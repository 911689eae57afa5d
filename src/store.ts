import { createStore } from "zustand/vanilla";

export interface BookCreatorState {
  /** A request is in flight; further clicks are ignored */
  busy: boolean;
  error: string | null;

  setBusy: (busy: boolean) => void;
  setError: (error: string | null) => void;
}

export const bookCreatorStore = createStore<BookCreatorState>()((set) => ({
  busy: false,
  error: null,

  setBusy: (busy) => set({ busy }),
  setError: (error) => set({ error }),
}));
