export { KeeperModule } from "./keeper.module";
export { KeeperService } from "./keeper.service";
export { KeeperScheduler } from "./keeper.scheduler";
export * from "./keeper.types";
