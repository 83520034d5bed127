export * from "./contentStore";
export * from "./filenames";
