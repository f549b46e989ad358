export { optimize } from "./lib/ast-optimize";
export { peepholeOptimize } from "./lib/peephole";
