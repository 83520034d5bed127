export * from "./downloader";
export * from "./downloadService";
