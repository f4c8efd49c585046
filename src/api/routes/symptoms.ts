import { FastifyInstance, FastifyPluginAsync } from 'fastify';
import type { SymptomCatalog } from '../../domain/catalog/service';

export interface SymptomRoutesOptions {
  catalog: SymptomCatalog;
}

/**
 * Public catalog summary, used by the chat front end for quick replies.
 */
export const symptomRoutes: FastifyPluginAsync<SymptomRoutesOptions> = async (
  app: FastifyInstance,
  { catalog }
) => {
  app.get('/', async () => {
    return {
      success: true,
      data: catalog.list().map(entry => ({
        key: entry.key,
        label: entry.label,
        synonyms: entry.synonyms,
        questionCount: entry.questions.length,
      })),
    };
  });
};
