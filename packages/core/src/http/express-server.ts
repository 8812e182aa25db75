import express, {
  type ErrorRequestHandler,
  type NextFunction,
  type Request,
  type Response,
} from "express";
import helmet from "helmet";
import cors from "cors";
import pinoHttp from "pino-http";
import multer from "multer";
import type { HttpServer, RequestLike, ResponseLike, HttpHandler } from "./http-server.js";
import { sendError, toErrorEnvelope } from "./respond.js";
import { createRequestLogger, type Logger } from "../observability/logger.js";

export interface ExpressServerOptions {
  /** Multipart field carrying the captured image. */
  uploadField?: string;
  maxUploadBytes?: number;
  logger?: Logger;
}

export function createExpressServer(opts: ExpressServerOptions = {}): HttpServer {
  const log = opts.logger ?? createRequestLogger();
  const app = express();
  // Capture forms redirect off-site after posting; form-action would block that.
  app.use(helmet({ contentSecurityPolicy: { directives: { formAction: null } } }));
  app.use(cors());
  // Captures are small and forwarded straight to a provider, so keep them in memory.
  // Active only for multipart/form-data requests.
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: opts.maxUploadBytes ?? 10 * 1024 * 1024, files: 1 },
  });
  app.use(upload.single(opts.uploadField ?? "photo"));
  app.use(express.json({ limit: "256kb" }));
  app.use(express.urlencoded({ extended: false }));
  app.use(pinoHttp({ logger: log }));
  // Errors raised by the middleware above (multipart limits, malformed JSON)
  const errorHandler: ErrorRequestHandler = (err, _req, res, _next) => {
    if (err instanceof multer.MulterError) {
      const tooLarge = err.code === "LIMIT_FILE_SIZE";
      res.status(tooLarge ? 413 : 400).json({
        status: "error",
        code: tooLarge ? "PAYLOAD_TOO_LARGE" : "BAD_UPLOAD",
        message: err.message,
      });
      return;
    }
    const status: unknown = err?.status;
    if (typeof status === "number" && status >= 400 && status < 500) {
      res.status(status).json({ status: "error", code: "BAD_REQUEST", message: "Malformed request" });
      return;
    }
    log.error({ err }, "Unhandled middleware error");
    const envelope = toErrorEnvelope(err);
    res.status(envelope.status).json(envelope.body);
  };
  app.use(errorHandler);

  const wrap = (h: HttpHandler) => (req: Request, res: Response, _next: NextFunction) => {
    const mfile = req.file;
    const reqAdapter: RequestLike = {
      params: req.params,
      query: req.query,
      body: req.body,
      headers: req.headers,
      file: mfile
        ? {
            buffer: mfile.buffer,
            fieldname: mfile.fieldname,
            originalname: mfile.originalname,
            mimetype: mfile.mimetype,
            size: mfile.size,
          }
        : undefined,
    };
    const resAdapter: ResponseLike = {
      status(code: number) {
        res.status(code);
        return this;
      },
      json(payload: unknown) {
        res.json(payload);
      },
      html(markup: string) {
        res.type("html").send(markup);
      },
      text(body: string) {
        res.type("text/plain").send(body);
      },
      header(name: string, value: string | string[]) {
        res.setHeader(name, value);
        return this;
      },
      redirect(url: string, status?: number) {
        if (status) res.redirect(status, url);
        else res.redirect(url);
      },
    };
    Promise.resolve()
      .then(() => h(reqAdapter, resAdapter))
      .catch((err: unknown) => {
        const { status } = toErrorEnvelope(err);
        if (status >= 500) log.error({ err }, "Request handler failed");
        if (res.headersSent) {
          res.end();
          return;
        }
        sendError(resAdapter, err);
      });
  };
  return {
    get: (p, h) => app.get(p, wrap(h)),
    post: (p, h) => app.post(p, wrap(h)),
    delete: (p, h) => app.delete(p, wrap(h)),
    listen: (port) =>
      new Promise((resolve) => {
        app.listen(port, () => resolve());
      }),
  };
}
