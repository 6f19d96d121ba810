export * from "./book.ts";
export * from "./classify.ts";
export * from "./cli.ts";
export * from "./convert.ts";
export * from "./dialect.ts";
export * from "./errors.ts";
export * from "./section.ts";
export * from "../universal/markdown.ts";
