export { ConfigModule } from "./config.module";
export { Environment, EnvironmentVariables, validate } from "./env.validation";
