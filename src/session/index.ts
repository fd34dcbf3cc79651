export * from "./sessionContext";
