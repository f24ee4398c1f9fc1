export * from "./der-builder.js";
export * from "../common/index.js";
