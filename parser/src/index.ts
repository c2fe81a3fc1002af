export * from "./batch";
export * from "./components";
export * from "./exceptions";
export * from "./parser";
export * from "./tokens";
export * from "./validation";
export * from "./zipper";
