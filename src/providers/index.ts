// Provider Registry
// Builds the model client used by the planner

import type { ModelClient } from './types.js';
import { VertexProvider } from './vertex.js';
import { env, isProviderConfigured } from '../env.js';

export function createModelClient(name = 'vertex'): ModelClient {
  if (!isProviderConfigured(name)) {
    throw new Error(`Provider "${name}" is not available or not configured`);
  }

  switch (name) {
    case 'vertex':
      return new VertexProvider({
        projectId: env.VERTEX_PROJECT_ID,
        location: env.VERTEX_LOCATION,
        model: env.VERTEX_MODEL,
        timeoutMs: env.VERTEX_TIMEOUT_MS,
      });
    default:
      throw new Error(`Provider "${name}" is not available or not configured`);
  }
}

export { VertexProvider } from './vertex.js';
export type { ModelClient, ChatSession, ModelReply, ModelTurn } from './types.js';
