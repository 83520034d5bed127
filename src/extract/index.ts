export * from "./client";
export * from "./engine";
export * from "./extractionService";
export * from "./fieldSchema";
export * from "./pricing";
export * from "./projection";
export * from "./textExtractor";
