export {
  chooseRepresentative,
  clusterIdFor,
  clusterRecords,
  normalizeRecords,
} from "./cluster";
export type { ClusterOptions } from "./cluster";
export { editSimilarity, nameSimilarity, tokenOverlap } from "./similarity";
export { UnionFind } from "./union-find";
export type { Cluster, NormalizedRecord, RawRecord } from "./types";
