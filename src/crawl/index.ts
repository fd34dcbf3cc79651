export * from "./browser";
export * from "./gridParser";
export * from "./playwrightBrowser";
export * from "./walker";
export * from "./walkState";
