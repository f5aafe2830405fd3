export { formatJson } from "./json";
export { formatMarkdown, formatBarLabel } from "./markdown";
export { formatCsv } from "./csv";
