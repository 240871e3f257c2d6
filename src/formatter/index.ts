export { type Formatter, type FormatterOptions } from "./formatter.js";
export { formatSignificant } from "./number-format.js";
export { formatJson } from "./json.js";
export { formatTerminal } from "./terminal.js";
