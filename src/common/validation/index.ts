export * from "./address";
export * from "./bigint";
