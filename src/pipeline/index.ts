export { runBoottime, boottimeLabel, type BoottimeOptions } from "./boottime";
export { runStartupTime, type StartupOptions } from "./startup";
export { runFio, fioSeriesLabel } from "./fio";
export { runIperf } from "./iperf";
export { runCpuUsage } from "./cpu";
export { runResourceUsage, selectSeries, type ResourceOptions } from "./resources";
export { buildLineChart, type LineLayout, type WindowOptions } from "./series";
export {
  createFileContext,
  readAndParse,
  type FileContext,
  type PipelineOptions,
} from "./files";
export * from "./tags";
