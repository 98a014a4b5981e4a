import fp from "fastify-plugin";
import type { FastifyInstance, FastifyError } from "fastify";

async function sensiblePlugin(fastify: FastifyInstance): Promise<void> {
  fastify.setErrorHandler((unknownError: FastifyError, request, reply) => {
    const statusCode = unknownError.statusCode ?? 500;

    if (statusCode >= 500) {
      request.log.error({ err: unknownError }, unknownError.message);
    } else {
      request.log.info({ err: unknownError }, unknownError.message);
    }

    if (unknownError.validation) {
      return reply.status(400).send({
        statusCode: 400,
        error: "Bad Request",
        message: unknownError.message,
      });
    }

    return reply.status(statusCode).send({
      statusCode,
      error: statusCode >= 500 ? "Internal Server Error" : unknownError.name,
      message:
        statusCode >= 500
          ? "An unexpected error occurred."
          : unknownError.message,
    });
  });

  fastify.setNotFoundHandler((_request, reply) => {
    reply.status(404).send({
      statusCode: 404,
      error: "Not Found",
      message: "Route not found.",
    });
  });
}

export default fp(sensiblePlugin, {
  name: "sensible",
  fastify: "5.x",
});
