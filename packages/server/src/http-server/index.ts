import { createServer, type IncomingMessage, type Server } from "node:http";
import { createLogger } from "@lexalign/shared";
import type { ITranslator } from "@lexalign/pipeline";
import { variables } from "../environment";
import { collectDefaultMetrics, recordRequest } from "../metrics";
import { ROUTES, route, type RouteResponse } from "../routes";

const logger = createLogger("http-server");

export interface IHttpServerConfig {
  translator: ITranslator;
  port?: number;
  host?: string;
  maxBodyBytes?: number;
}

class BodyTooLargeError extends Error {}

/**
 * Buffer the request body. Past `limit` the rest is read and discarded, so
 * the client still receives the 413 instead of a reset connection.
 */
function readBody(req: IncomingMessage, limit: number): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;

    req.on("data", (chunk: Buffer) => {
      size += chunk.length;
      if (size <= limit) chunks.push(chunk);
    });
    req.on("end", () => {
      if (size > limit) {
        reject(new BodyTooLargeError(`Body exceeds ${limit} bytes`));
      } else {
        resolve(Buffer.concat(chunks).toString("utf8"));
      }
    });
    req.on("error", reject);
  });
}

const routeLabel = (pathname: string) =>
  ROUTES.find((known) => known === pathname) ?? "unknown";

export function startHttpServer({
  translator,
  port = variables.PORT,
  host = variables.HOST,
  maxBodyBytes = variables.MAX_BODY_BYTES,
}: IHttpServerConfig): Promise<Server> {
  collectDefaultMetrics();

  async function handle(req: IncomingMessage): Promise<RouteResponse> {
    const { pathname } = new URL(req.url ?? "/", "http://localhost");
    const method = req.method ?? "GET";

    let body = "";
    if (method === "POST") {
      try {
        body = await readBody(req, maxBodyBytes);
      } catch (error) {
        if (error instanceof BodyTooLargeError) {
          return {
            status: 413,
            body: { error: "PAYLOAD_TOO_LARGE", message: error.message },
          };
        }
        throw error;
      }
    }

    return route({ method, pathname, body }, translator);
  }

  const server = createServer((req, res) => {
    const startTime = performance.now();
    const label = routeLabel(
      new URL(req.url ?? "/", "http://localhost").pathname,
    );

    void handle(req)
      .catch((error: unknown): RouteResponse => {
        logger.error({ err: error, route: label }, "Request failed");
        return {
          status: 500,
          body: {
            error: "INTERNAL",
            message: error instanceof Error ? error.message : String(error),
          },
        };
      })
      .then((response) => {
        const payload =
          typeof response.body === "string"
            ? response.body
            : JSON.stringify(response.body);

        res.writeHead(response.status, {
          "Content-Type": response.contentType ?? "application/json",
        });
        res.end(payload);

        const durationMS = performance.now() - startTime;
        recordRequest(label, response.status, durationMS);
        logger.debug(
          { route: label, status: response.status, durationMS },
          "Handled request",
        );
      })
      .catch((error: unknown) => {
        logger.error({ err: error }, "Failed to write response");
        res.destroy();
      });
  });

  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, host, () => {
      server.off("error", reject);
      resolve(server);
    });
  });
}
