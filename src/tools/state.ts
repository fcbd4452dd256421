import { getServices } from '../services.js';
import type { StateInput } from '../types.js';

export async function handleReadState() {
  const { state, logger } = getServices();
  logger.info('Reading state');
  const current = await state.read();
  return { success: true as const, state: current };
}

export async function handleWriteState(args: { state: StateInput }) {
  const { state, logger } = getServices();
  logger.info('Writing state');
  await state.write(args.state);
  return { success: true as const, message: 'State updated' };
}

export const stateTools = {
  read_state: {
    description: 'Read agent state from persistent storage. Every call counts as a wake: wake_count is incremented and last_wake stamped.',
    inputSchema: {
      type: 'object' as const,
      properties: {},
    },
    handler: handleReadState,
  },
  write_state: {
    description: 'Replace agent state. Send the complete state each time; version, wake_count, created_at and last_wake are server-owned and ignored.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        state: { type: 'object', description: 'Complete state object to persist' },
      },
      required: ['state'],
    },
    handler: handleWriteState,
  },
};
