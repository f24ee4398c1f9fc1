export * from "./builder/der-builder.js";
export * from "./parser/der-parser.js";
export * from "./common/index.js";
