import { createStore } from 'zustand/vanilla'
import { isTerminalStatus, type TransferItem } from '../types/transfer'
import type { TransferManager } from '../../core/services/TransferManager'

interface TransferState {
  transfers: TransferItem[]
  setTransfers: (items: TransferItem[]) => void
  updateTransfer: (item: TransferItem) => void
  removeTransfer: (id: string) => void
  clearFinished: () => void
}

export const transferStore = createStore<TransferState>()((set) => ({
  transfers: [],

  setTransfers: (items) => set({ transfers: items }),

  updateTransfer: (item) =>
    set((state) => {
      const idx = state.transfers.findIndex((t) => t.id === item.id)
      if (idx === -1) {
        return { transfers: [...state.transfers, item] }
      }
      const updated = [...state.transfers]
      updated[idx] = item
      return { transfers: updated }
    }),

  removeTransfer: (id) =>
    set((state) => ({
      transfers: state.transfers.filter((t) => t.id !== id)
    })),

  clearFinished: () =>
    set((state) => ({
      transfers: state.transfers.filter((t) => !isTerminalStatus(t.status))
    }))
}))

/** Mirror a TransferManager into the store; returns the unbind function */
export function bindTransferStore(manager: TransferManager, store = transferStore): () => void {
  const { setTransfers, updateTransfer, removeTransfer } = store.getState()
  setTransfers(manager.getAll())

  manager.on('update', updateTransfer)
  manager.on('removed', removeTransfer)
  return () => {
    manager.off('update', updateTransfer)
    manager.off('removed', removeTransfer)
  }
}
