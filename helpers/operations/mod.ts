export * from "./core.ts";
export * from "./intersperse.ts";
