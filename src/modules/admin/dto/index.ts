export * from "./parameters.dto";
export * from "./roles.dto";
export * from "./upkeep.dto";
