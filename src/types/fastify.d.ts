import "fastify";

declare module "fastify" {
  interface FastifyRequest {
    /** Engine caller identity, set in preValidation. */
    caller: string;
  }
}

