export * from "./modelService";
export * from "./verification";
