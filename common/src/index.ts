export * from "./address";
export * from "./exceptions";
export * from "./text";
export * from "./utils";
