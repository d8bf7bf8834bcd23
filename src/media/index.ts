export { resolveMediaUri, describeContentPart } from "./uri.js";
