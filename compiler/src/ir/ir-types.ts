export * from "./ir-types/index.ts";
