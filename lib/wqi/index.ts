// lib/wqi/index.ts

export * from "./constants";
export * from "./errors";
export * from "./types";
export * from "./subIndices";
export * from "./classification";
export * from "./validation";
export * from "./calculate";
export * from "./summary";
export * from "./batch";
export * from "./compliance";
