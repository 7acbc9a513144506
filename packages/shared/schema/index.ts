export * from "./commerce";
