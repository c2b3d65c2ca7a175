export type { FormatErrorKind, ShellmarkErrorOptions } from "./types.js";
export { FormatError, isShellmarkError, ProbeReadError, ShellmarkError } from "./types.js";
