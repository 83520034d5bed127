export * from "./taskQueue";
