export { DigestRunState, type DigestRunStateType } from "./state.js";
export { extractNode, makeClassifyNode, aggregateNode, makeSummarizeNode } from "./nodes.js";
export { createDigestGraph, runDigestPipeline, runUnreadDigest, computeStats } from "./graph.js";
export { loadDigestDeps } from "./deps.js";
