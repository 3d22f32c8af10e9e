import type { Server } from "node:http";
import { createLogger } from "@lexalign/shared";
import { startHttpServer, type IHttpServerConfig } from "./http-server";

export { startHttpServer, type IHttpServerConfig } from "./http-server";
export {
  route,
  translateRoute,
  translateRequestSchema,
  ROUTES,
  type RouteRequest,
  type RouteResponse,
  type TranslateRequestBody,
} from "./routes";
export { register, recordRequest, collectDefaultMetrics } from "./metrics";
export { variables } from "./environment";

const logger = createLogger("server");

/**
 * Start the HTTP server and close it, along with the translator, on SIGINT or
 * SIGTERM.
 */
export async function runServer(config: IHttpServerConfig): Promise<Server> {
  const server = await startHttpServer(config);
  const address = server.address();
  const where =
    address && typeof address === "object"
      ? `http://${address.address}:${address.port}`
      : String(address);

  logger.info(`Translation server listening on ${where}`);
  logger.info(`Health check: ${where}/health`);

  let stopping = false;
  const shutdown = () => {
    if (stopping) return;
    stopping = true;
    logger.info("Shutting down translation server...");

    server.close((error) => {
      if (error) logger.error({ err: error }, "Error closing HTTP server");
    });
    config.translator
      .close()
      .then(() => logger.info("Server shutdown complete"))
      .catch((error: unknown) =>
        logger.error({ err: error }, "Error closing translator"),
      );
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);

  return server;
}
