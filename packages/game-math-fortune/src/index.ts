export * from "./types";
export * from "./wheel";
export * from "./phrase";
export * from "./moves";
export * from "./policy";
export * from "./player";
export * from "./engine";
