export { loadSourceTree } from "./sourceLoader";
export type { LoadedSourceTree, SourceTreeOptions } from "./sourceLoader";
