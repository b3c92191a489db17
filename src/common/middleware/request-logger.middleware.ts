import { Injectable, Logger, NestMiddleware } from "@nestjs/common";
import { Request, Response, NextFunction } from "express";
import { randomUUID } from "crypto";

/** Access log line per request; propagates or mints x-request-id. */
@Injectable()
export class RequestLoggerMiddleware implements NestMiddleware {
  private readonly logger = new Logger("HTTP");

  use(req: Request, res: Response, next: NextFunction) {
    const { method, originalUrl } = req;
    const requestId = req.header("x-request-id") ?? randomUUID();

    req.headers["x-request-id"] = requestId;
    res.setHeader("x-request-id", requestId);

    const start = Date.now();
    const account = req.header("x-account") ?? req.header("x-admin-subject") ?? "-";

    res.on("finish", () => {
      const duration = Date.now() - start;
      const level = res.statusCode >= 500 ? "error" : res.statusCode >= 400 ? "warn" : "log";
      this.logger[level](
        `${method} ${originalUrl} ${res.statusCode} ${duration}ms account=${account} [${requestId}]`,
      );
    });

    next();
  }
}
