export * from "./config";
export * from "./errors";
export * from "./paths";
export * from "./task";
export * from "./trigger";
export * from "./workspace";
