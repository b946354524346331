export * from "./lib";
export * from "./translate/config";
export * from "./translate/translate-text";
