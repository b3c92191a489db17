export * from "./fixed-point";
