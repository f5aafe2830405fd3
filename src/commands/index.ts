export { boottimeCommand, type BoottimeCommandOptions } from "./boottime";
export { startupCommand } from "./startup";
export { fioCommand } from "./fio";
export { iperfCommand } from "./iperf";
export {
  cpuCommand,
  resourcesCommand,
  type ResourcesCommandOptions,
  type SeriesCommandOptions,
} from "./timeseries";
export {
  emitResult,
  parseFormat,
  resolveRunContext,
  type ReportOptions,
  type RunContext,
} from "./shared";
