import { MiddlewareConsumer, Module, NestModule } from "@nestjs/common";
import { ThrottlerModule, ThrottlerGuard } from "@nestjs/throttler";
import { APP_GUARD } from "@nestjs/core";
import { ConfigModule } from "./modules/config";
import { HealthModule } from "./modules/health";
import { LedgerModule } from "./modules/ledger";
import { PricingModule } from "./modules/pricing";
import { AccessModule } from "./modules/access";
import { VaultModule } from "./modules/vault";
import { KeeperModule } from "./modules/keeper";
import { AdminModule } from "./modules/admin";
import { RequestLoggerMiddleware } from "./common/middleware/request-logger.middleware";

@Module({
  imports: [
    ConfigModule,
    ThrottlerModule.forRoot([
      {
        name: "default",
        ttl: 60_000,
        limit: 60,
      },
    ]),
    LedgerModule,
    PricingModule,
    AccessModule,
    VaultModule,
    KeeperModule,
    AdminModule,
    HealthModule,
  ],
  providers: [
    {
      provide: APP_GUARD,
      useClass: ThrottlerGuard,
    },
  ],
})
export class AppModule implements NestModule {
  configure(consumer: MiddlewareConsumer) {
    consumer.apply(RequestLoggerMiddleware).forRoutes("*");
  }
}
