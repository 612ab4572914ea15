export * from "./binary";
export * from "./config";
export * from "./logger";
export * from "./validation";
export * from "./vector";
export * from "./xml/codec";
export * from "./xml/element";
