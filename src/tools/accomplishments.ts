import { getServices } from '../services.js';
import type { NewAccomplishment } from '../types.js';

export async function handleLogAccomplishment(args: NewAccomplishment) {
  const { accomplishments } = getServices();
  await accomplishments.append(args);
  return { success: true as const, message: 'Accomplishment logged' };
}

export const accomplishmentTools = {
  log_accomplishment: {
    description: 'Log a completed piece of work. Entries are append-only and count toward metrics.total_accomplishments.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        category: { type: 'string', description: 'Category of work' },
        description: { type: 'string', description: 'What was accomplished' },
        impact: { type: 'string', enum: ['low', 'medium', 'high'], description: 'Impact level' },
        artifacts: { type: 'array', items: { type: 'string' }, description: 'Created artifacts (default none)' },
      },
      required: ['category', 'description', 'impact'],
    },
    handler: handleLogAccomplishment,
  },
};
