import type { FastifyPluginAsync } from 'fastify';
import type { DocumentInventory } from '../adapters/types';
import { errorMessage } from '../utils/errors';

export interface DocumentRouteOptions {
  inventory: DocumentInventory;
}

/**
 * Document inventory routes.
 * - GET /api/v1/documents - source documents with their chunk counts
 */
export const documentRoutes: FastifyPluginAsync<DocumentRouteOptions> = async (fastify, opts) => {
  fastify.get('/', async (request, reply) => {
    try {
      const documents = await opts.inventory.listDocuments();
      return {
        count: documents.length,
        documents,
      };
    } catch (error) {
      fastify.log.error({ error }, 'Failed to fetch documents');
      return reply.code(503).send({
        error: 'Failed to fetch documents',
        details: errorMessage(error),
      });
    }
  });
};
