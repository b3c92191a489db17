import "reflect-metadata";
import { NestFactory } from "@nestjs/core";
import { Logger, ValidationPipe } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { AppModule } from "./app.module";
import { AllExceptionsFilter } from "./common/filters/all-exceptions.filter";

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  const config = app.get(ConfigService);
  const port = config.get<number>("PORT", 3000);

  // ─── Global pipes ───
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
    }),
  );

  // ─── Global filters ───
  app.useGlobalFilters(new AllExceptionsFilter());

  // ─── CORS: env-configured allowlist, restrictive by default ───
  const rawOrigins = config.get<string>("CORS_ORIGINS", "");
  const allowedOrigins = rawOrigins
    .split(",")
    .map((o) => o.trim())
    .filter(Boolean);

  app.enableCors({
    origin: (origin, callback) => {
      // No Origin header (server-to-server) is only accepted outside production.
      if (!origin) {
        const isProd = config.get<string>("NODE_ENV") === "production";
        return callback(isProd ? new Error("Origin required") : null, !isProd);
      }
      if (allowedOrigins.includes(origin)) {
        return callback(null, true);
      }
      return callback(new Error(`CORS: origin ${origin} not allowed`), false);
    },
    methods: ["GET", "POST", "OPTIONS"],
    allowedHeaders: ["Content-Type", "x-api-key", "x-admin-subject", "x-account", "x-request-id"],
    credentials: false,
  });

  app.enableShutdownHooks();
  await app.listen(port);
  Logger.log(`tranche-vault-engine listening on http://localhost:${port}`, "Bootstrap");
}

bootstrap().catch((err: unknown) => {
  const reason = err instanceof Error ? err.stack ?? err.message : String(err);
  Logger.error(`Bootstrap failed: ${reason}`, "Bootstrap");
  process.exit(1);
});
