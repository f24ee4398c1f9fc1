export * from "./der-parser.js";
export * from "../common/index.js";
