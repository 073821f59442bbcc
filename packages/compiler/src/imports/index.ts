export { resolveImports, type ImportConsumer } from "./resolve-imports.js";
