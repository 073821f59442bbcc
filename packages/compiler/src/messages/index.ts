export { compileMessages, type CompiledMessages, type CompiledRole } from "./compile-messages.js";
export { DispatchTableBuilder, createDispatchTable } from "./dispatch-table.js";
