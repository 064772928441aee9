import express, { type NextFunction, type Request, type Response } from "express";
import type { Server } from "node:http";
import type { Aggregator } from "../controllers/aggregator/index.js";
import { isPod } from "../models/guards.js";
import type {
  APIResourceList,
  APIVersions,
  NodeList,
  Pod,
  PodList,
  Status,
} from "../models/types.js";
import { getErrorMessage, isNotFoundError } from "../utils/errors.js";
import logger from "../utils/logger.js";
import { EventStreamer } from "./event-streamer.js";

export const DEFAULT_KEEP_ALIVE_MS = 15_000;

export interface HttpServerOptions {
  port?: number;
  eventStreamer?: EventStreamer;
  /** Interval of SSE comment lines that keep idle streams open */
  keepAliveMs?: number;
}

const API_RESOURCES: APIResourceList = {
  kind: "APIResourceList",
  groupVersion: "v1",
  resources: [
    {
      name: "pods",
      singularName: "pod",
      namespaced: true,
      kind: "Pod",
      verbs: ["get", "list", "create", "delete"],
    },
    {
      name: "pods/log",
      singularName: "",
      namespaced: true,
      kind: "Pod",
      verbs: ["get"],
    },
    {
      name: "nodes",
      singularName: "node",
      namespaced: false,
      kind: "Node",
      verbs: ["get", "list"],
    },
  ],
};

function failure(code: number, reason: string, message: string): Status {
  return {
    apiVersion: "v1",
    kind: "Status",
    status: "Failure",
    message,
    reason,
    code,
  };
}

/**
 * Map aggregator failures onto Kubernetes Status responses. Only the two
 * not-found kinds are 404s; the message keeps any upstream body.
 */
function sendError(res: Response, error: unknown, context: string) {
  const message = getErrorMessage(error);
  if (isNotFoundError(error)) {
    res.status(404).json(failure(404, "NotFound", message));
    return;
  }
  logger.error(`${context}: ${message}`);
  res.status(500).json(failure(500, "InternalError", message));
}

/**
 * Kubernetes-style REST surface and pod event stream over the aggregator
 */
export class HttpServer {
  private app: express.Application;
  private aggregator: Aggregator;
  private eventStreamer: EventStreamer;
  private port: number;
  private keepAliveMs: number;
  private server: Server | null = null;

  constructor(aggregator: Aggregator, options: HttpServerOptions = {}) {
    this.app = express();
    this.aggregator = aggregator;
    this.eventStreamer =
      options.eventStreamer ?? new EventStreamer(aggregator);
    this.port = options.port ?? 9090;
    this.keepAliveMs = options.keepAliveMs ?? DEFAULT_KEEP_ALIVE_MS;

    this.setupMiddleware();
    this.setupRoutes();
    this.setupErrorHandler();
  }

  private setupMiddleware() {
    this.app.use(express.json());

    // Request logging middleware
    this.app.use((req: Request, res: Response, next: NextFunction) => {
      logger.debug(`${req.method} ${req.path}`);
      next();
    });
  }

  private setupRoutes() {
    // Health check endpoints
    this.app.get("/healthz", (req: Request, res: Response) => {
      res.status(200).type("text/plain").send("ok\n");
    });

    this.app.get("/readyz", (req: Request, res: Response) => {
      const ready = this.aggregator
        .snapshot()
        .some((client) => client.isHealthy());
      res.status(ready ? 200 : 503).send(ready ? "Ready" : "Not Ready");
    });

    // API discovery
    this.app.get("/api", (req: Request, res: Response) => {
      const versions: APIVersions = {
        kind: "APIVersions",
        versions: ["v1"],
        serverAddressByClientCIDRs: [
          { clientCIDR: "0.0.0.0/0", serverAddress: `0.0.0.0:${this.port}` },
        ],
      };
      res.json(versions);
    });

    this.app.get("/api/v1", (req: Request, res: Response) => {
      res.json(API_RESOURCES);
    });

    // Pods
    this.app.get("/api/v1/pods", async (req: Request, res: Response) => {
      const list: PodList = {
        apiVersion: "v1",
        kind: "PodList",
        items: await this.aggregator.listAllPods(),
      };
      res.json(list);
    });

    this.app.get(
      "/api/v1/namespaces/:namespace/pods",
      async (req: Request, res: Response) => {
        const list: PodList = {
          apiVersion: "v1",
          kind: "PodList",
          items: await this.aggregator.listNamespacedPods(req.params.namespace),
        };
        res.json(list);
      },
    );

    this.app.post(
      "/api/v1/namespaces/:namespace/pods",
      async (req: Request, res: Response) => {
        const body: unknown = req.body;
        if (!isPod(body)) {
          res
            .status(400)
            .json(failure(400, "BadRequest", "request body is not a Pod"));
          return;
        }

        const pod: Pod = {
          ...body,
          metadata: { ...body.metadata, namespace: req.params.namespace },
        };
        try {
          const created = await this.aggregator.createPod(pod);
          res.status(201).json(created);
        } catch (error) {
          sendError(res, error, "Error creating pod");
        }
      },
    );

    this.app.get(
      "/api/v1/namespaces/:namespace/pods/:name",
      async (req: Request, res: Response) => {
        try {
          const { pod } = await this.aggregator.getPod(
            req.params.namespace,
            req.params.name,
          );
          res.json(pod);
        } catch (error) {
          sendError(res, error, "Error getting pod");
        }
      },
    );

    this.app.delete(
      "/api/v1/namespaces/:namespace/pods/:name",
      async (req: Request, res: Response) => {
        const { namespace, name } = req.params;
        try {
          await this.aggregator.deletePod(namespace, name);
          const status: Status = {
            apiVersion: "v1",
            kind: "Status",
            status: "Success",
            message: `pod "${name}" deleted`,
          };
          res.json(status);
        } catch (error) {
          sendError(res, error, "Error deleting pod");
        }
      },
    );

    this.app.get(
      "/api/v1/namespaces/:namespace/pods/:name/log",
      async (req: Request, res: Response) => {
        const { namespace, name } = req.params;
        const container = req.query.container;
        try {
          const log =
            typeof container === "string" && container !== ""
              ? await this.aggregator.getContainerLog(namespace, name, container)
              : await this.aggregator.getPodLog(namespace, name);
          res.status(200).type("text/plain; charset=utf-8").send(log);
        } catch (error) {
          sendError(res, error, "Error getting pod log");
        }
      },
    );

    // Nodes
    this.app.get("/api/v1/nodes", async (req: Request, res: Response) => {
      const list: NodeList = {
        apiVersion: "v1",
        kind: "NodeList",
        items: await this.aggregator.listAllNodes(),
      };
      res.json(list);
    });

    this.app.get("/api/v1/nodes/:name", async (req: Request, res: Response) => {
      try {
        res.json(await this.aggregator.getNode(req.params.name));
      } catch (error) {
        sendError(res, error, "Error getting node");
      }
    });

    // Console
    this.app.get("/console/summary", async (req: Request, res: Response) => {
      res.json(await this.aggregator.getClusterSummary());
    });

    this.app.get(
      "/console/events/pods",
      async (req: Request, res: Response) => {
        res.status(200).set({
          "Content-Type": "text/event-stream",
          "Cache-Control": "no-cache",
          Connection: "keep-alive",
        });
        res.flushHeaders();

        const session = new AbortController();
        res.on("close", () => session.abort());
        const keepAlive = setInterval(() => {
          res.write(": keep-alive\n\n");
        }, this.keepAliveMs);

        try {
          for await (const event of this.eventStreamer.session(
            session.signal,
          )) {
            res.write(`event: ${event.event}\ndata: ${event.data}\n\n`);
          }
        } catch (error) {
          logger.error(`Pod event stream failed: ${getErrorMessage(error)}`);
        } finally {
          clearInterval(keepAlive);
          session.abort();
          res.end();
        }
      },
    );
  }

  // Body parser failures arrive here
  private setupErrorHandler() {
    this.app.use(
      (error: unknown, req: Request, res: Response, next: NextFunction) => {
        if (res.headersSent) {
          next(error);
          return;
        }
        const badRequest =
          typeof error === "object" &&
          error !== null &&
          "status" in error &&
          error.status === 400;
        if (badRequest) {
          res
            .status(400)
            .json(failure(400, "BadRequest", getErrorMessage(error)));
          return;
        }
        sendError(res, error, `Error handling ${req.method} ${req.path}`);
      },
    );
  }

  /**
   * Listen on the configured port; resolves with the port actually bound
   */
  start() {
    return new Promise<number>((resolve, reject) => {
      const server = this.app.listen(this.port, () => {
        const address = server.address();
        if (address !== null && typeof address === "object") {
          this.port = address.port;
        }
        logger.info(`HTTP server listening on port ${this.port}`);
        resolve(this.port);
      });
      server.once("error", reject);
      this.server = server;
    });
  }

  /**
   * Close the listener and any open connections, event streams included
   */
  stop() {
    return new Promise<void>((resolve, reject) => {
      const server = this.server;
      if (!server) {
        resolve();
        return;
      }
      this.server = null;
      server.close((error) => (error ? reject(error) : resolve()));
      server.closeAllConnections();
    });
  }
}
