export { compileType, compileProperty, compileParams, type CompileTypeOptions } from "./compile-type.js";
export { toDocumentation } from "./documentation.js";
