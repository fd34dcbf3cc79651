export * from "./downloader";
export * from "./exportRequest";
export * from "./fileStore";
export * from "./rateLimiter";
export * from "./retryPolicy";
