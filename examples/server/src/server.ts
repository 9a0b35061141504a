/**
 * Example server
 *
 * Start: npm run start --workspace @gqlserve/example-server
 */

import { GraphQLError } from "graphql";
import { createLogger, createServer } from "@gqlserve/handler";
import { createCatalog, createRootValue, schema } from "./schema.js";

const PORT = process.env.PORT ? parseInt(process.env.PORT, 10) : 4000;

const logger = createLogger({ level: "debug" });
const catalog = createCatalog();

const server = createServer({
  schema,
  port: PORT,
  title: "Book Catalog",
  playground: true,
  logger,
  rootValue: (_context, _request, options) => createRootValue(catalog, options.uploadedFiles),
  onBeforeResponse: (context, _params, _result, headers) => {
    headers.set("X-Request-Method", context.request.method);
  },
  onResult: (_context, params, result, body) => {
    logger.debug("Response written", {
      operationName: params.operationName,
      errors: result.errors?.length ?? 0,
      bytes: body.byteLength,
    });
  },
  formatError: (error) => new GraphQLError(error.message).toJSON(),
});

server
  .listen()
  .then((info) => {
    logger.info(`GraphQL: ${info.url}/graphql`);
  })
  .catch((error: unknown) => {
    logger.error("Could not start server", error);
    process.exitCode = 1;
  });
