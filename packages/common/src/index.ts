export { formatPath, joinPath, isIdentifierKey } from "./path";
