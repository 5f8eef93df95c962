import { createStore } from 'zustand/vanilla';

import { encodeCommand } from '@/services/ble/commandEncoder';
import type { ActuationCommand } from '@/types/device';

/** The one open connection, bound to the command characteristic. */
export interface CommandWriter {
  writeCommand: (payload: Uint8Array) => Promise<void>;
}

export interface SessionState {
  writer: CommandWriter | null;
  writesCompleted: number;
  registerWriter: (writer: CommandWriter | null) => void;
  requestWrite: (command: ActuationCommand) => Promise<void>;
}

export const createSessionStore = () => {
  // Writes are chained so that only one command is ever in flight.
  let pending: Promise<void> = Promise.resolve();

  return createStore<SessionState>()((set, get) => {
    const performWrite = async (command: ActuationCommand) => {
      const { writer } = get();
      if (!writer) {
        throw new Error('No active BLE connection');
      }

      await writer.writeCommand(encodeCommand(command.value, command.channel));
      set((state) => ({ writesCompleted: state.writesCompleted + 1 }));
    };

    return {
      writer: null,
      writesCompleted: 0,
      registerWriter: (writer) => set({ writer }),
      requestWrite: (command) => {
        const run = pending.then(() => performWrite(command));
        pending = run.catch(() => undefined);
        return run;
      },
    };
  });
};

export type SessionStore = ReturnType<typeof createSessionStore>;
