import { Type } from '@sinclair/typebox';
import type { FastifyPluginAsyncTypebox } from '@fastify/type-provider-typebox';

const rootRoutes: FastifyPluginAsyncTypebox = async (fastify) => {
  fastify.get(
    '/',
    {
      schema: {
        hide: true,
        response: {
          200: Type.Object({
            name: Type.String(),
            api: Type.String(),
            documentation: Type.Optional(Type.String()),
          }),
        },
      },
    },
    async () => {
      const { config } = fastify;
      return {
        name: 'chronicle',
        api: `${config.API_PREFIX}/${config.API_VERSION}`,
        documentation: config.SWAGGER_ENABLED ? config.SWAGGER_PATH : undefined,
      };
    }
  );
};

export default rootRoutes;
