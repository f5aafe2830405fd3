export {
  discoverResultSets,
  matchesTag,
  resultSetFilePath,
  type DiscoveryOptions,
  type ResultSet,
} from "./resultSets";
