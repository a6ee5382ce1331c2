export * from "./constants";
export * from "./parser";
export * from "./types";
export * from "./validation";
export * from "./writer";
