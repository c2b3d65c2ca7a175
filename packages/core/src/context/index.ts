export type { ContextOptions } from "./context.js";
export { Context } from "./context.js";
