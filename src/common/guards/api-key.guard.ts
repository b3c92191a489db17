import {
  CanActivate,
  ExecutionContext,
  Injectable,
  InternalServerErrorException,
  Logger,
  UnauthorizedException,
} from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { createHash, timingSafeEqual } from "crypto";
import { Request } from "express";

function digest(value: string): Buffer {
  return createHash("sha256").update(value).digest();
}

/**
 * Operator API-key guard, fail-closed.
 * Compares `x-api-key` with ADMIN_API_KEY by SHA-256 digest in constant
 * time. An unset key is a misconfiguration (500), never an open door.
 */
@Injectable()
export class ApiKeyGuard implements CanActivate {
  private readonly logger = new Logger(ApiKeyGuard.name);

  constructor(private readonly config: ConfigService) {}

  canActivate(context: ExecutionContext): boolean {
    const expected = this.config.get<string>("ADMIN_API_KEY");

    if (!expected) {
      this.logger.error("[admin_auth] ADMIN_API_KEY not configured, refusing all operator calls");
      throw new InternalServerErrorException(
        "Server misconfiguration: ADMIN_API_KEY is not set",
      );
    }

    const req = context.switchToHttp().getRequest<Request>();
    const provided = req.header("x-api-key");

    if (!provided || !timingSafeEqual(digest(provided), digest(expected))) {
      this.logger.warn(
        `[admin_auth] rejected ${req.method} ${req.originalUrl} subject=${req.header("x-admin-subject") ?? "-"}`,
      );
      throw new UnauthorizedException("Invalid or missing admin API key");
    }

    return true;
  }
}
