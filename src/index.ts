export * from "./core/version";
export * from "./core/content-update";
export * from "./core/changelog";
export * from "./core/manifest";
export * from "./core/config";
export * from "./core/git";
export * from "./core/build";
export * from "./core/guards";
export * from "./core/operator";
export * from "./core/reporter";
export * from "./core/release";
export * from "./types/errors";
